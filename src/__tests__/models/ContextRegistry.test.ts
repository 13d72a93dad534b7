import {
  ContextRegistry,
  WorkerContext,
  defineInheritableLocal,
  getContextRegistry,
  getLogger,
  scopeAlreadyExitedError,
  type ILog,
} from "../..";

describe("ContextRegistry", () => {
  const registry = new ContextRegistry();
  const A = defineInheritableLocal<number>({
    id: "tests.registry.a",
    registry,
  });
  const B = defineInheritableLocal<string>({
    id: "tests.registry.b",
    registry,
  });

  it("registers each declaration once", () => {
    expect(registry.size).toBe(2);
    expect(registry.entries().map((entry) => entry.label)).toEqual([
      "tests.registry.a",
      "tests.registry.b",
    ]);
    expect(registry.entries()[0].key).toBe(A.key);
  });

  it("snapshots only the locals active on the calling worker", () => {
    const snapshot = A.syncScope(1, () => registry.snapshotCurrent());

    expect(snapshot.size).toBe(1);
    expect(snapshot.has(A)).toBe(true);
    expect(snapshot.has(B)).toBe(false);
    expect(snapshot.keys()).toEqual([A.key]);
    snapshot.release();
  });

  it("captures a counted reference instead of a copy", () => {
    const value = { region: "eu" };
    const Region = defineInheritableLocal<{ region: string }>({
      id: "tests.registry.region",
      registry: new ContextRegistry(),
    });
    expect(Region.syncScope(value, () => Region.get())).toBe(value);

    A.syncScope(3, () => {
      const snapshot = registry.snapshotCurrent();
      const [binding] = snapshot.bindings();
      expect(binding.handle.refCount).toBe(2);
      expect(binding.handle.value).toBe(3);

      snapshot.release();
      expect(binding.handle.refCount).toBe(1);
      expect(snapshot.released).toBe(true);
    });
  });

  it("installs onto the given worker only and restore undoes it", () => {
    const snapshot = A.syncScope(7, () => registry.snapshotCurrent());
    const worker = new WorkerContext("tests.registry.worker");

    expect(worker.run(() => A.isSet())).toBe(false);
    const token = registry.install(snapshot, worker);

    expect(worker.run(() => A.get())).toBe(7);
    expect(A.isSet()).toBe(false);

    registry.restore(token);
    expect(token.restored).toBe(true);
    expect(worker.run(() => A.isSet())).toBe(false);
    snapshot.release();
  });

  it("nests an installed value under the worker's own scopes", () => {
    const snapshot = A.syncScope(1, () => registry.snapshotCurrent());
    const worker = new WorkerContext();

    const seen = worker.run(() =>
      A.syncScope(2, () => {
        const token = registry.install(snapshot);
        const inner = A.get();
        registry.restore(token);
        return [inner, A.get()];
      }),
    );

    expect(seen).toEqual([1, 2]);
    snapshot.release();
  });

  it("treats restoring a token twice as a fatal invariant violation", () => {
    const logs: ILog[] = [];
    const stop = getLogger().onLog((log) => logs.push(log));
    const snapshot = A.syncScope(1, () => registry.snapshotCurrent());
    const token = registry.install(snapshot);
    registry.restore(token);

    let caught: unknown;
    try {
      registry.restore(token);
    } catch (error) {
      caught = error;
    }
    stop();
    snapshot.release();

    expect(scopeAlreadyExitedError.is(caught)).toBe(true);
    if (scopeAlreadyExitedError.is(caught)) {
      expect(caught.fatal).toBe(true);
      expect(caught.data).toEqual({ worker: "main", bindings: 1 });
    }
    expect(logs.map((log) => log.level)).toContain("critical");
    expect(A.isSet()).toBe(false);
  });

  it("hides declarations registered after the first query", () => {
    const late = new ContextRegistry();
    const Early = defineInheritableLocal<number>({
      id: "tests.registry.early",
      registry: late,
    });
    expect(late.isSealed).toBe(false);

    late.snapshotCurrent().release();
    const Late = defineInheritableLocal<number>({
      id: "tests.registry.late",
      registry: late,
    });

    expect(late.isSealed).toBe(true);
    expect(late.size).toBe(1);

    const snapshot = Early.syncScope(1, () =>
      Late.syncScope(2, () => late.snapshotCurrent()),
    );
    expect(snapshot.has(Early)).toBe(true);
    expect(snapshot.has(Late)).toBe(false);
    snapshot.release();

    // still usable as a plain scoped local
    expect(Late.syncScope(3, () => Late.get())).toBe(3);
  });

  it("releases every captured handle even when a dispose hook throws", () => {
    const own = new ContextRegistry();
    const First = defineInheritableLocal<number>({
      id: "tests.registry.first",
      registry: own,
      dispose: () => {
        throw new Error("first dispose");
      },
    });
    const disposeSecond = jest.fn();
    const Second = defineInheritableLocal<number>({
      id: "tests.registry.second",
      registry: own,
      dispose: disposeSecond,
    });
    const snapshot = First.syncScope(1, () =>
      Second.syncScope(2, () => own.snapshotCurrent()),
    );

    expect(() => snapshot.release()).toThrow("first dispose");
    expect(disposeSecond).toHaveBeenCalledWith(2);
    expect(snapshot.bindings().every((b) => b.handle.released)).toBe(true);
    expect(() => snapshot.release()).not.toThrow();
  });

  it("exposes one process-wide registry", () => {
    expect(getContextRegistry()).toBe(getContextRegistry());
    expect(getContextRegistry()).not.toBe(registry);
  });
});
