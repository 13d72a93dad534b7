import {
  PENDING,
  andThen,
  coroutine,
  lazy,
  map,
  pollAfterCompletionError,
  pollFn,
  ready,
  suspend,
  suspendNotReadyError,
  yieldNow,
} from "../..";

describe("pollable toolkit", () => {
  const noop = () => undefined;

  it("ready() completes on the first poll", () => {
    expect(ready("x").poll(noop)).toEqual({ ready: true, value: "x" });
  });

  it("lazy() calls fn again on every poll", () => {
    let count = 0;
    const counter = lazy(() => ++count);

    expect(counter.poll(noop)).toEqual({ ready: true, value: 1 });
    expect(counter.poll(noop)).toEqual({ ready: true, value: 2 });
  });

  it("yieldNow() wakes itself once before completing", () => {
    const wake = jest.fn();
    const yielding = yieldNow();

    expect(yielding.poll(wake)).toEqual({ ready: false });
    expect(wake).toHaveBeenCalledTimes(1);
    expect(yielding.poll(wake)).toEqual({ ready: true, value: undefined });
    expect(wake).toHaveBeenCalledTimes(1);
  });

  it("map() transforms a ready value and forwards cancellation", () => {
    expect(map(ready(2), (n) => n * 10).poll(noop)).toEqual({
      ready: true,
      value: 20,
    });

    const cancel = jest.fn();
    const mapped = map(
      pollFn<number>(() => PENDING, cancel),
      (n) => n + 1,
    );
    expect(mapped.poll(noop)).toEqual({ ready: false });
    mapped.cancel?.();
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("andThen() chains a second pollable built from the first result", () => {
    const chained = andThen(
      map(yieldNow(), () => "first"),
      (value) => ready(`${value}+second`),
    );

    expect(chained.poll(noop)).toEqual({ ready: false });
    expect(chained.poll(noop)).toEqual({
      ready: true,
      value: "first+second",
    });
  });

  it("andThen() cancels whichever step is running", () => {
    const cancelFirst = jest.fn();
    const cancelSecond = jest.fn();
    const chained = andThen(ready(1), () =>
      pollFn<number>(() => PENDING, cancelSecond),
    );
    const stuck = andThen(pollFn<number>(() => PENDING, cancelFirst), ready);

    chained.poll(noop);
    chained.cancel?.();
    stuck.poll(noop);
    stuck.cancel?.();

    expect(cancelSecond).toHaveBeenCalledTimes(1);
    expect(cancelFirst).toHaveBeenCalledTimes(1);
  });

  it("suspend() refuses to resume while its pollable is pending", () => {
    const steps = suspend(pollFn<number>(() => PENDING));
    steps.next();

    let caught: unknown;
    try {
      steps.next();
    } catch (error) {
      caught = error;
    }

    expect(suspendNotReadyError.is(caught)).toBe(true);
    if (suspendNotReadyError.is(caught)) {
      expect(caught.fatal).toBe(true);
      expect(caught.message).toContain(
        "suspend() resumed before its pollable was ready.",
      );
    }
  });

  describe("coroutine()", () => {
    it("runs straight through when everything is ready", () => {
      const sum = coroutine(function* () {
        const a = yield* suspend(ready(2));
        const b = yield* suspend(lazy(() => 3));
        return a + b;
      });
      expect(sum.poll(noop)).toEqual({ ready: true, value: 5 });
    });

    it("suspends while an awaited pollable is pending", () => {
      const steps: string[] = [];
      const body = coroutine(function* () {
        steps.push("start");
        yield* suspend(yieldNow());
        steps.push("resumed");
        return steps.length;
      });

      expect(body.poll(noop)).toEqual({ ready: false });
      expect(steps).toEqual(["start"]);
      expect(body.poll(noop)).toEqual({ ready: true, value: 2 });
      expect(steps).toEqual(["start", "resumed"]);
    });

    it("throws errors of awaited pollables back into the body", () => {
      const body = coroutine(function* () {
        try {
          yield* suspend(
            lazy(() => {
              throw new Error("failed step");
            }),
          );
          return "no error";
        } catch (error) {
          return error instanceof Error ? `caught ${error.message}` : "?";
        }
      });
      expect(body.poll(noop)).toEqual({
        ready: true,
        value: "caught failed step",
      });
    });

    it("propagates uncaught errors and then refuses further polls", () => {
      const boom = new Error("boom");
      const body = coroutine(function* () {
        yield* suspend(ready(1));
        throw boom;
      });

      expect(() => body.poll(noop)).toThrow(boom);

      let caught: unknown;
      try {
        body.poll(noop);
      } catch (error) {
        caught = error;
      }
      expect(pollAfterCompletionError.is(caught)).toBe(true);
      if (pollAfterCompletionError.is(caught)) {
        expect(caught.data).toEqual({
          pollable: "Coroutine",
          state: "completed",
        });
      }
    });

    it("cancels the pollable it is waiting on", () => {
      const cancel = jest.fn();
      const body = coroutine(function* () {
        return yield* suspend(pollFn<number>(() => PENDING, cancel));
      });

      body.poll(noop);
      body.cancel?.();
      body.cancel?.();

      expect(cancel).toHaveBeenCalledTimes(1);
      expect(() => body.poll(noop)).toThrow(
        "Coroutine was polled after it was cancelled.",
      );
    });
  });
});
