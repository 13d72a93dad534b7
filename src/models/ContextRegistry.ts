import { scopeAlreadyExitedError } from "../errors";
import { getLogger } from "../config";
import {
  InheritanceSnapshot,
  type ICapturedBinding,
} from "./InheritanceSnapshot";
import { currentWorker, type WorkerContext } from "./WorkerContext";

/**
 * Type-erased view of one declaration.
 */
export interface IRegistryEntry {
  readonly key: symbol;
  readonly label: string;
  /** Is a value active for this declaration on `worker`? */
  isActive(worker: WorkerContext): boolean;
  /**
   * Retains the active handle on `worker` and returns it bound to the
   * declaration's cell. Only called when `isActive(worker)` holds.
   */
  capture(worker: WorkerContext): ICapturedBinding;
}

/**
 * Undoes exactly one `install`. Restoring it twice is an invariant violation.
 */
export class RestoreToken {
  private isRestored = false;

  constructor(
    readonly worker: WorkerContext,
    readonly bindings: ReadonlyArray<ICapturedBinding>,
  ) {}

  get restored(): boolean {
    return this.isRestored;
  }

  /** @internal */
  markRestored(): void {
    if (this.isRestored) {
      scopeAlreadyExitedError.throw({
        worker: this.worker.name,
        bindings: this.bindings.length,
      });
    }
    this.isRestored = true;
  }
}

/**
 * Append-only list of inheritable declarations.
 *
 * Entries registered before the first query are the only ones ever
 * inherited: the first `snapshotCurrent()` or `install()` seals the visible
 * list. Declarations whose module loads later still work as plain scoped
 * locals but never propagate through `inherit()`.
 */
export class ContextRegistry {
  private readonly registered: IRegistryEntry[] = [];
  private visible: ReadonlyArray<IRegistryEntry> | null = null;

  register(entry: IRegistryEntry): void {
    this.registered.push(entry);
    getLogger().trace(`Registered inheritable local "${entry.label}"`, {
      source: "registry",
      sealed: this.visible !== null,
    });
  }

  get isSealed(): boolean {
    return this.visible !== null;
  }

  /** Number of declarations visible to inheritance (all of them until sealed). */
  get size(): number {
    return this.entries().length;
  }

  entries(): ReadonlyArray<IRegistryEntry> {
    return this.visible ?? this.registered;
  }

  /**
   * Captures a shared handle for every visible declaration active on
   * `worker`.
   */
  snapshotCurrent(worker: WorkerContext = currentWorker()): InheritanceSnapshot {
    const captured: ICapturedBinding[] = [];
    for (const entry of this.seal()) {
      if (entry.isActive(worker)) {
        captured.push(entry.capture(worker));
      }
    }
    getLogger().trace("Captured inheritance snapshot", {
      source: "registry",
      worker: worker.name,
      data: { locals: captured.map((b) => b.label) },
    });
    return new InheritanceSnapshot(captured);
  }

  /**
   * Pushes every binding of `snapshot` onto `worker`'s cells.
   */
  install(
    snapshot: InheritanceSnapshot,
    worker: WorkerContext = currentWorker(),
  ): RestoreToken {
    this.seal();
    const bindings = snapshot.bindings();
    for (const binding of bindings) {
      binding.install(worker);
    }
    return new RestoreToken(worker, bindings);
  }

  /**
   * Pops what the matching `install` pushed, innermost first.
   */
  restore(token: RestoreToken): void {
    token.markRestored();
    const { bindings, worker } = token;
    for (let i = bindings.length - 1; i >= 0; i--) {
      bindings[i].uninstall(worker);
    }
  }

  private seal(): ReadonlyArray<IRegistryEntry> {
    if (!this.visible) {
      this.visible = Object.freeze(this.registered.slice());
    }
    return this.visible;
  }
}

let globalRegistry: ContextRegistry | null = null;

/**
 * The process-wide registry, created on first use.
 */
export function getContextRegistry(): ContextRegistry {
  if (!globalRegistry) {
    globalRegistry = new ContextRegistry();
  }
  return globalRegistry;
}
