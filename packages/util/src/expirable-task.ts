/**
 * Races a promise against a timer. Resolves with {@link ExpirableTask.TimeoutExpired} when the timer wins.
 * The timer is cleared as soon as the promise settles, so a pending task never keeps the process alive.
 */
export class ExpirableTask {
  public static readonly TimeoutExpired: unique symbol = Symbol('TimeoutExpired');

  public static timeout<T>(promise: Promise<T>, ms: number): Promise<T | typeof ExpirableTask.TimeoutExpired> {
    return new Promise<T | typeof ExpirableTask.TimeoutExpired>((resolve, reject) => {
      const timer = setTimeout(() => resolve(ExpirableTask.TimeoutExpired), ms);
      promise.then(
        (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }
}
