import type { ContextRegistry } from "../../../models/ContextRegistry";
import type { IInheritableLocalMeta } from "../../../types/meta";
import type { IValidationSchema } from "../../../types/utilities";

/**
 * Internal state for the InheritableLocalFluentBuilder.
 * Kept immutable and frozen.
 */
export type BuilderState<T> = Readonly<{
  id: string;
  schema?: IValidationSchema<T>;
  dispose?: (value: T) => void;
  meta: IInheritableLocalMeta;
  registry?: ContextRegistry;
}>;
