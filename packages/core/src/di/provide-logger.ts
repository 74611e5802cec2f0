import { commonTokens, tokens } from '@condition-gate/api/plugin';
import { Logger, LoggerFactoryMethod } from '@condition-gate/api/logging';
import log4js from 'log4js';
import { Injector, Scope } from 'typed-inject';

export interface LoggerContext {
  [commonTokens.getLogger]: LoggerFactoryMethod;
  [commonTokens.logger]: Logger;
}

export function provideLogger(injector: Injector): Injector<LoggerContext> {
  return injector.provideValue(commonTokens.getLogger, log4js.getLogger).provideFactory(commonTokens.logger, loggerFactory, Scope.Transient);
}

function loggerFactory(getLogger: LoggerFactoryMethod, target: { name: string } | undefined) {
  return getLogger(target ? target.name : 'UNKNOWN');
}
loggerFactory.inject = tokens(commonTokens.getLogger, commonTokens.target);
