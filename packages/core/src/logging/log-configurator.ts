import { LogLevel } from '@condition-gate/api/logging';
import log4js from 'log4js';

const LOG_PATTERN = '%[%d{HH:mm:ss.SSS} (%z) %p %c%] %m';

/**
 * Log output goes to stderr, so that reports written to stdout stay machine readable.
 */
export class LogConfigurator {
  public static configure(consoleLogLevel: LogLevel = LogLevel.Information): void {
    log4js.configure({
      appenders: {
        console: { type: 'stderr', layout: { type: 'pattern', pattern: LOG_PATTERN } },
        filteredConsole: { type: 'logLevelFilter', appender: 'console', level: consoleLogLevel },
      },
      categories: {
        default: { appenders: ['filteredConsole'], level: consoleLogLevel },
      },
    });
  }

  public static shutdown(): Promise<void> {
    return new Promise((resolve, reject) => {
      log4js.shutdown((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
