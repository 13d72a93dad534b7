import {
  ContextRegistry,
  getLogger,
  lazy,
  type ILog,
  type IPollable,
  PENDING,
  WorkerContext,
  defineInheritableLocal,
  inherit,
  isInheritingPollable,
  pollAfterCompletionError,
  pollFn,
  readyPoll,
  ready,
} from "../..";

describe("InheritingPollable", () => {
  const registry = new ContextRegistry();
  const disposed: string[] = [];
  const Tenant = defineInheritableLocal<string>({
    id: "tests.inheriting.tenant",
    registry,
    dispose: (value) => disposed.push(value),
  });
  const noop = () => undefined;

  beforeEach(() => {
    disposed.length = 0;
  });

  it("moves from unpolled through polling to completed", () => {
    let calls = 0;
    const inner = pollFn<string>(() => {
      calls++;
      return calls < 2 ? PENDING : readyPoll(Tenant.get());
    });
    const wrapped = Tenant.syncScope("acme", () =>
      inherit(inner, { registry }),
    );

    expect(wrapped.state).toBe("unpolled");
    expect(wrapped.inherited).toBe(1);

    expect(wrapped.poll(noop)).toEqual({ ready: false });
    expect(wrapped.state).toBe("polling");

    expect(wrapped.poll(noop)).toEqual({ ready: true, value: "acme" });
    expect(wrapped.state).toBe("completed");
    expect(disposed).toEqual(["acme"]);
  });

  it("leaves nothing installed between polls", () => {
    const wrapped = Tenant.syncScope("acme", () =>
      inherit(
        pollFn<boolean>(() => PENDING),
        { registry },
      ),
    );
    wrapped.poll(noop);
    expect(Tenant.isSet()).toBe(false);
    wrapped.cancel();
  });

  it("installs on whichever worker polls it", () => {
    const first = new WorkerContext("tests.inheriting.first");
    const second = new WorkerContext("tests.inheriting.second");
    const seen: string[] = [];
    let calls = 0;
    const inner = pollFn<number>(() => {
      calls++;
      seen.push(
        `${Tenant.get()}@${first.isCurrent() ? "first" : "second"}`,
      );
      return calls < 2 ? PENDING : readyPoll(calls);
    });
    const wrapped = Tenant.syncScope("acme", () =>
      inherit(inner, { registry }),
    );

    first.run(() => wrapped.poll(noop));
    expect(first.run(() => Tenant.isSet())).toBe(false);
    const outcome = second.run(() => wrapped.poll(noop));

    expect(outcome).toEqual({ ready: true, value: 2 });
    expect(seen).toEqual(["acme@first", "acme@second"]);
    expect(second.run(() => Tenant.isSet())).toBe(false);
  });

  it("passes errors through unchanged and releases the snapshot", () => {
    const boom = new Error("boom");
    const wrapped = Tenant.syncScope("acme", () =>
      inherit(
        pollFn<never>(() => {
          throw boom;
        }),
        { registry },
      ),
    );

    let caught: unknown;
    try {
      wrapped.poll(noop);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBe(boom);
    expect(wrapped.state).toBe("completed");
    expect(disposed).toEqual(["acme"]);
    expect(Tenant.isSet()).toBe(false);
  });

  it("cancels the inner pollable and releases the snapshot", () => {
    const cancelInner = jest.fn();
    const wrapped = Tenant.syncScope("acme", () =>
      inherit(
        pollFn<number>(() => PENDING, cancelInner),
        { registry },
      ),
    );
    expect(disposed).toEqual([]);

    wrapped.cancel();
    wrapped.cancel();

    expect(wrapped.state).toBe("cancelled");
    expect(cancelInner).toHaveBeenCalledTimes(1);
    expect(disposed).toEqual(["acme"]);
  });

  it("refuses to be polled once finished", () => {
    const wrapped = inherit(ready(1), { registry });
    wrapped.poll(noop);

    let caught: unknown;
    try {
      wrapped.poll(noop);
    } catch (error) {
      caught = error;
    }

    expect(pollAfterCompletionError.is(caught)).toBe(true);
    if (pollAfterCompletionError.is(caught)) {
      expect(caught.data).toEqual({
        pollable: "Inheriting pollable",
        state: "completed",
      });
    }
  });

  it("carries nothing when wrapped outside every scope", () => {
    const wrapped = inherit(
      pollFn(() => readyPoll(Tenant.isSet())),
      { registry },
    );
    expect(wrapped.inherited).toBe(0);
    expect(wrapped.poll(noop)).toEqual({ ready: true, value: false });
  });

  it("is recognisable by its brand", () => {
    expect(isInheritingPollable(inherit(ready(1), { registry }))).toBe(true);
    expect(isInheritingPollable(ready(1))).toBe(false);
    expect(isInheritingPollable(null)).toBe(false);
  });

  describe("with a failing dispose hook", () => {
    const failing = new ContextRegistry();
    const Broken = defineInheritableLocal<string>({
      id: "tests.inheriting.broken",
      registry: failing,
      dispose: () => {
        throw new Error("dispose broken");
      },
    });
    const disposeHealthy = jest.fn();
    const Healthy = defineInheritableLocal<string>({
      id: "tests.inheriting.healthy",
      registry: failing,
      dispose: disposeHealthy,
    });

    const wrapBoth = <T>(inner: IPollable<T>) =>
      Broken.syncScope("b", () =>
        Healthy.syncScope("h", () => inherit(inner, { registry: failing })),
      );

    let errors: ILog[];
    let stop: () => void;

    beforeEach(() => {
      disposeHealthy.mockClear();
      errors = [];
      stop = getLogger().onLog((log) => {
        if (log.level === "error") errors.push(log);
      });
    });

    afterEach(() => stop());

    it("still returns the inner value", () => {
      const wrapped = wrapBoth(lazy(() => 42));

      expect(wrapped.poll(noop)).toEqual({ ready: true, value: 42 });
      expect(wrapped.state).toBe("completed");
      expect(disposeHealthy).toHaveBeenCalledTimes(1);
      expect(disposeHealthy).toHaveBeenCalledWith("h");
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe("Disposing inherited values failed");
      expect(errors[0].error?.message).toBe("dispose broken");
    });

    it("still rethrows the inner error", () => {
      const inner = new Error("inner");
      const wrapped = wrapBoth(
        pollFn<number>(() => {
          throw inner;
        }),
      );

      let caught: unknown;
      try {
        wrapped.poll(noop);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBe(inner);
      expect(disposeHealthy).toHaveBeenCalledTimes(1);
      expect(errors).toHaveLength(1);
    });

    it("still finishes cancellation", () => {
      const cancelInner = jest.fn();
      const wrapped = wrapBoth(pollFn<number>(() => PENDING, cancelInner));

      expect(() => wrapped.cancel()).not.toThrow();
      expect(cancelInner).toHaveBeenCalledTimes(1);
      expect(disposeHealthy).toHaveBeenCalledTimes(1);
      expect(errors).toHaveLength(1);
    });
  });
});
