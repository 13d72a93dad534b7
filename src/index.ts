import {
  defineInheritableLocal,
  isInheritableLocal,
} from "./definers/defineInheritableLocal";
import { defineError } from "./definers/defineError";
import { inheritableLocal as inheritableLocalFn } from "./definers/builders/inheritableLocal";
import { error as errorFn } from "./definers/builders/error";
import { inherit, wrap, isInheritingPollable } from "./inherit";
import { configure, getLogger } from "./config";
import { createTestExecutor, TestExecutor, JoinHandle } from "./testing";

export {
  defineInheritableLocal,
  defineInheritableLocal as inheritableLocal,
  defineError,
  isInheritableLocal,
  inherit,
  wrap,
  isInheritingPollable,
  configure,
  getLogger,
  createTestExecutor,
  TestExecutor,
  JoinHandle,
};

// Expose a single namespace `r` that contains all builder entry points
export const r = Object.freeze({
  inheritableLocal: inheritableLocalFn,
  error: errorFn,
});

export * from "./errors";
export * as definitions from "./defs";
export * from "./defs";
export * from "./models";
export * from "./tools/pollables";
export type { InheritOptions } from "./inherit";
export type { InheritanceOptions } from "./config";
export type { TestExecutorOptions } from "./testing";
