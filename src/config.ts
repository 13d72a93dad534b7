import { Logger, type LogLevels, type PrintStrategy } from "./models/Logger";

export type InheritanceOptions = {
  /**
   * Configure logging settings.
   */
  logs?: {
    /**
     * Defaults to null, which prints nothing. Listeners registered through
     * `getLogger().onLog()` still receive every log.
     */
    printThreshold?: null | LogLevels;
    /**
     * Defaults to pretty.
     */
    printStrategy?: PrintStrategy;
    /**
     * Defaults to auto-detection (TTY and NO_COLOR).
     */
    useColors?: boolean;
  };
};

let activeLogger: Logger | null = null;

function createLogger(options: InheritanceOptions): Logger {
  const {
    printThreshold = null,
    printStrategy = "pretty",
    useColors,
  } = options.logs ?? {};
  return new Logger({ printThreshold, printStrategy, useColors });
}

/**
 * Replaces the library logger. Listeners registered on the previous logger
 * are dropped with it.
 */
export function configure(options: InheritanceOptions = {}): Logger {
  activeLogger = createLogger(options);
  return activeLogger;
}

export function getLogger(): Logger {
  if (!activeLogger) {
    activeLogger = createLogger({});
  }
  return activeLogger;
}
