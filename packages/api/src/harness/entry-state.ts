/**
 * Life cycle of a single test entry during a run:
 * `Registered -> Evaluating -> { Ignored | Running -> { Passed | Failed } }`.
 * An entry abandoned at the run deadline goes straight to `Failed` from `Registered` or `Evaluating`.
 */
export enum EntryState {
  Registered = 'registered',
  Evaluating = 'evaluating',
  Running = 'running',
  Passed = 'passed',
  Failed = 'failed',
  Ignored = 'ignored',
}

const allowedTransitions: Readonly<Record<EntryState, readonly EntryState[]>> = Object.freeze({
  [EntryState.Registered]: [EntryState.Evaluating, EntryState.Failed],
  [EntryState.Evaluating]: [EntryState.Ignored, EntryState.Running, EntryState.Failed],
  [EntryState.Running]: [EntryState.Passed, EntryState.Failed, EntryState.Ignored],
  [EntryState.Passed]: [],
  [EntryState.Failed]: [],
  [EntryState.Ignored]: [],
});

export function canTransition(from: EntryState, to: EntryState): boolean {
  return allowedTransitions[from].includes(to);
}
