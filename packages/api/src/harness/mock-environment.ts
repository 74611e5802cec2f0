export interface MockEnvironment<THandle> {
  /**
   * Called once, before the first entry of the group needs the environment.
   * Throw a `PartialSetupError` when something was acquired before the failure, so it gets torn down.
   */
  setup(): Promise<THandle> | THandle;
  /**
   * Called once, after the last entry of the group finished.
   */
  teardown(handle: THandle): Promise<void> | void;
  /**
   * When true, the environment is set up before the predicates of the group's entries are evaluated,
   * so predicates can probe services that the environment starts.
   */
  eager?: boolean;
}
