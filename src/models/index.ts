export * from "./Logger";
export { LogPrinter } from "./LogPrinter";
export type {
  PrintableLog,
  PrintStrategy as LogPrinterPrintStrategy,
} from "./LogPrinter";
export * from "./WorkerContext";
export * from "./SharedHandle";
export * from "./ScopedCell";
export * from "./ScopedPollable";
export * from "./InheritanceSnapshot";
export * from "./ContextRegistry";
export * from "./InheritingPollable";
