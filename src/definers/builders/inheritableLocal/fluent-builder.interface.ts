import type { ContextRegistry } from "../../../models/ContextRegistry";
import type { IInheritableLocal } from "../../../types/inheritableLocal";
import type { IInheritableLocalMeta } from "../../../types/meta";
import type { IValidationSchema } from "../../../types/utilities";

export interface InheritableLocalFluentBuilder<T = unknown> {
  id: string;
  schema(schema: IValidationSchema<T>): InheritableLocalFluentBuilder<T>;
  dispose(fn: (value: T) => void): InheritableLocalFluentBuilder<T>;
  meta<TNewMeta extends IInheritableLocalMeta>(
    m: TNewMeta,
  ): InheritableLocalFluentBuilder<T>;
  /** Registers into `registry` instead of the process-wide one. */
  registry(registry: ContextRegistry): InheritableLocalFluentBuilder<T>;
  /** Declares the local. Registration happens here, once. */
  build(): IInheritableLocal<T>;
}
