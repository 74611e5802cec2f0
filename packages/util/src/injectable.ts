/**
 * The public shape of a class, so that collaborators can be replaced by plain objects (or stubs) in tests.
 */
export type I<T> = {
  [K in keyof T]: T[K];
};
