const isPlainOrCallable = (value: object): boolean => {
  if (typeof value === "function" || Array.isArray(value)) return true;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

/**
 * Freezes `value` together with the plain objects, arrays and functions
 * reachable through its data properties. Class instances found below the
 * root (registries, loggers) stay mutable.
 */
export function deepFreeze<T>(value: T): T {
  freeze(value, new WeakSet<object>(), true);
  return value;
}

function freeze(value: unknown, seen: WeakSet<object>, isRoot: boolean) {
  if (typeof value !== "object" && typeof value !== "function") return;
  if (value === null || seen.has(value)) return;
  if (!isRoot && !isPlainOrCallable(value)) return;
  seen.add(value);

  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (descriptor && "value" in descriptor) {
      freeze(descriptor.value, seen, false);
    }
  }
  Object.freeze(value);
}
