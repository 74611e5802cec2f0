import { errorToString } from './errors.js';

export class GateError extends Error {
  /**
   * The message without the inner error.
   */
  public readonly ownMessage: string;

  constructor(
    message: string,
    public readonly innerError?: unknown,
  ) {
    super(`${message}${innerError ? `. Inner error: ${errorToString(innerError)}` : ''}`);
    this.name = new.target.name;
    this.ownMessage = message;
  }
}
