import {
  LogPrinter,
  type LogLevels,
  type PrintStrategy,
  type PrintableLog,
} from "./LogPrinter";

export type { LogLevels, PrintStrategy };

export interface ILogInfo {
  source?: string;
  error?: unknown;
  data?: Record<string, unknown>;
  [key: string]: unknown;
}

export type ILog = PrintableLog;

export type LogListener = (log: ILog) => void;

export interface LoggerOptions {
  /** Use null to disable printing. Listeners still receive every log. */
  printThreshold: null | LogLevels;
  printStrategy: PrintStrategy;
  useColors?: boolean;
}

/**
 * Synchronous structured logger. Every call site sits on a poll path, so
 * nothing here awaits.
 */
export class Logger {
  private readonly printThreshold: null | LogLevels;
  private readonly printer: LogPrinter;
  private readonly boundContext: Record<string, unknown>;
  private readonly source?: string;
  // Children created with .with() share listeners with their root
  private rootLogger?: Logger;
  private readonly localListeners: LogListener[] = [];

  public static Severity: Readonly<Record<LogLevels, number>> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    critical: 5,
  };

  constructor(
    options: LoggerOptions,
    boundContext: Record<string, unknown> = {},
    source?: string,
    printer?: LogPrinter,
  ) {
    this.printThreshold = options.printThreshold;
    this.boundContext = { ...boundContext };
    this.source = source;
    this.printer =
      printer ??
      new LogPrinter({
        strategy: options.printStrategy,
        useColors: options.useColors ?? Logger.detectColorSupport(),
      });
  }

  private static detectColorSupport(): boolean {
    // Respect NO_COLOR convention
    if (process.env.NO_COLOR) return false;
    return !!process.stdout?.isTTY;
  }

  /**
   * Creates a child logger with an additional source and bound context.
   */
  public with({
    source,
    additionalContext,
  }: {
    source?: string;
    additionalContext?: Record<string, unknown>;
  }): Logger {
    const child = new Logger(
      { printThreshold: this.printThreshold, printStrategy: "plain" },
      { ...this.boundContext, ...additionalContext },
      source ?? this.source,
      this.printer,
    );
    child.rootLogger = this.rootLogger ?? this;
    return child;
  }

  public log(level: LogLevels, message: string, logInfo: ILogInfo = {}): void {
    const { source, error, data, ...context } = logInfo;

    const log: ILog = {
      level,
      message,
      source: source ?? this.source,
      timestamp: new Date(),
      error: error === undefined ? undefined : this.extractErrorInfo(error),
      data,
      context: { ...this.boundContext, ...context },
    };

    const root = this.rootLogger ?? this;
    root.triggerLogListeners(log);

    if (root.canPrint(level)) {
      root.printer.print(log);
    }
  }

  private extractErrorInfo(error: unknown): NonNullable<ILog["error"]> {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return {
      name: "UnknownError",
      message: String(error),
    };
  }

  public trace(message: string, logInfo?: ILogInfo) {
    this.log("trace", message, logInfo);
  }

  public debug(message: string, logInfo?: ILogInfo) {
    this.log("debug", message, logInfo);
  }

  public info(message: string, logInfo?: ILogInfo) {
    this.log("info", message, logInfo);
  }

  public warn(message: string, logInfo?: ILogInfo) {
    this.log("warn", message, logInfo);
  }

  public error(message: string, logInfo?: ILogInfo) {
    this.log("error", message, logInfo);
  }

  public critical(message: string, logInfo?: ILogInfo) {
    this.log("critical", message, logInfo);
  }

  /**
   * @returns a function removing the listener
   */
  public onLog(listener: LogListener): () => void {
    const root = this.rootLogger ?? this;
    root.localListeners.push(listener);
    return () => {
      const index = root.localListeners.indexOf(listener);
      if (index !== -1) root.localListeners.splice(index, 1);
    };
  }

  public canPrint(level: LogLevels): boolean {
    if (this.printThreshold === null) {
      return false;
    }
    return Logger.Severity[level] >= Logger.Severity[this.printThreshold];
  }

  private triggerLogListeners(log: ILog) {
    for (const listener of this.localListeners) {
      try {
        listener(log);
      } catch (error) {
        // listener failures are printed, never rethrown
        this.printer.print({
          level: "error",
          message: "Error in log listener",
          timestamp: new Date(),
          error: this.extractErrorInfo(error),
        });
      }
    }
  }
}
