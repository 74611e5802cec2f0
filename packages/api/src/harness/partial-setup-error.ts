import { GateError } from '@condition-gate/util';

/**
 * Thrown from `MockEnvironment.setup` after some resources were already acquired.
 * The handle is passed to `teardown` so the acquired part is released.
 */
export class PartialSetupError<THandle> extends GateError {
  constructor(
    message: string,
    public readonly handle: THandle,
    innerError?: unknown,
  ) {
    super(message, innerError);
  }
}
