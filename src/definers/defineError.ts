import type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
  IInheritanceError,
} from "../types/error";
import type { IErrorMeta } from "../types/meta";
import { symbolError } from "../types/symbols";
import { getLogger } from "../config";

export class InheritanceError<TData extends DefaultErrorType = DefaultErrorType>
  extends Error
  implements IInheritanceError<TData>
{
  public readonly data: TData;
  constructor(
    public readonly id: string,
    message: string,
    data: TData,
    public readonly fatal: boolean,
  ) {
    super(message);
    this.data = data;
    this.name = id;
  }
}

export class ErrorHelper<TData extends DefaultErrorType = DefaultErrorType>
  implements IErrorHelper<TData>
{
  [symbolError] = true as const;
  constructor(private readonly definition: IErrorDefinition<TData>) {}
  get id(): string {
    return this.definition.id;
  }
  get fatal(): boolean {
    return this.definition.fatal ?? false;
  }
  get meta(): IErrorMeta {
    return this.definition.meta ?? {};
  }
  throw(data: TData): never {
    const error = new InheritanceError(
      this.definition.id,
      this.message(data),
      data,
      this.fatal,
    );
    if (this.fatal) {
      getLogger().critical(error.message, { source: "errors", error });
    }
    throw error;
  }
  is(error: unknown): error is InheritanceError<TData> {
    return error instanceof InheritanceError && error.id === this.definition.id;
  }
  private message(data: TData): string {
    const { format, remediation } = this.definition;
    const base = format ? format(data) : this.definition.id;
    if (!remediation) return base;
    const advice =
      typeof remediation === "function" ? remediation(data) : remediation;
    return `${base}\n\nRemediation: ${advice}`;
  }
}

/**
 * Create a new error helper. Prefer the fluent `r.error()` builder.
 */
export function defineError<TData extends DefaultErrorType = DefaultErrorType>(
  definition: IErrorDefinition<TData>,
) {
  return new ErrorHelper<TData>(definition);
}

export function isInheritanceError(error: unknown): error is InheritanceError {
  return error instanceof InheritanceError;
}
