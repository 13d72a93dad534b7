import type { SharedHandle } from "./SharedHandle";
import type { WorkerContext } from "./WorkerContext";

/**
 * One captured (declaration, handle) pair. The push/pop operations close
 * over the declaration's typed cell, which is how the registry stays
 * type-erased without casting values back.
 */
export interface ICapturedBinding {
  readonly key: symbol;
  readonly label: string;
  readonly handle: SharedHandle<unknown>;
  install(worker: WorkerContext): void;
  uninstall(worker: WorkerContext): void;
}

/**
 * The inheritable values active when a pollable was wrapped. Immutable;
 * owned by exactly one wrapper, which releases it once.
 */
export class InheritanceSnapshot {
  private isReleased = false;
  private readonly bindingsByKey: ReadonlyMap<symbol, ICapturedBinding>;

  constructor(bindings: ReadonlyArray<ICapturedBinding>) {
    this.bindingsByKey = new Map(
      bindings.map((b): [symbol, ICapturedBinding] => [b.key, b]),
    );
  }

  get size(): number {
    return this.bindingsByKey.size;
  }

  get released(): boolean {
    return this.isReleased;
  }

  has(local: { readonly key: symbol }): boolean {
    return this.bindingsByKey.has(local.key);
  }

  keys(): symbol[] {
    return Array.from(this.bindingsByKey.keys());
  }

  /** Bindings in capture order. */
  bindings(): ICapturedBinding[] {
    return Array.from(this.bindingsByKey.values());
  }

  /**
   * Drops this snapshot's count on every captured handle. Idempotent.
   * Every handle is released even when a dispose hook throws; the first
   * such error is rethrown afterwards.
   */
  release(): void {
    if (this.isReleased) return;
    this.isReleased = true;
    let failure: { error: unknown } | null = null;
    for (const binding of this.bindingsByKey.values()) {
      try {
        binding.handle.release();
      } catch (error) {
        failure ??= { error };
      }
    }
    if (failure) {
      throw failure.error;
    }
  }
}
