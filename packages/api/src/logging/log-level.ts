export enum LogLevel {
  Off = 'off',
  Fatal = 'fatal',
  Error = 'error',
  Warning = 'warn',
  Information = 'info',
  Debug = 'debug',
  Trace = 'trace',
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}
