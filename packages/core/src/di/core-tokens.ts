export const coreTokens = Object.freeze({
  fileLock: 'fileLock',
  predicateEvaluator: 'predicateEvaluator',
  probes: 'probes',
  reporter: 'reporter',
  timer: 'timer',
  writer: 'writer',
} as const);
