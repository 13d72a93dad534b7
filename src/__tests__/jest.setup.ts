import { configure } from "../config";
import { LogPrinter } from "../models/LogPrinter";

afterEach(() => {
  LogPrinter.resetWriters();
  configure();
});
