/**
 * Common metadata you can attach to declarations and errors.
 * Useful for docs and diagnostics.
 */

export interface IMeta {
  title?: string;
  description?: string;
}

export interface IInheritableLocalMeta extends IMeta {}
export interface IErrorMeta extends IMeta {}
