/**
 * JSON for log output. Bigints print as strings, objects met a second time
 * as "[Circular]", and objects nested deeper than `maxDepth` as "[Object]"
 * or "[Array]".
 */
export function safeStringify(
  value: unknown,
  space?: number,
  maxDepth = Infinity,
): string {
  const depths = new WeakMap<object, number>();

  function replacer(this: unknown, _key: string, val: unknown): unknown {
    if (typeof val === "bigint") return val.toString();
    if (typeof val !== "object" || val === null) return val;
    if (depths.has(val)) return "[Circular]";

    const holder: object = Object(this);
    const depth = (depths.get(holder) ?? 0) + 1;
    if (depth > maxDepth) return Array.isArray(val) ? "[Array]" : "[Object]";
    depths.set(val, depth);
    return val;
  }

  try {
    return JSON.stringify(value, replacer, space) ?? String(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return `[Unserializable: ${reason}]`;
  }
}
