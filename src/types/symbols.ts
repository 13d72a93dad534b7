/**
 * Internal brand symbols used to tag created objects at runtime and help with
 * type-narrowing. Prefer the `isInheritableLocal`/`isInheritanceError`
 * helpers instead of touching these directly.
 * @internal
 */
export const symbolInheritableLocal: unique symbol = Symbol.for(
  "inheritable.local",
);
/** @internal Marks error helpers produced by the error builder */
export const symbolError: unique symbol = Symbol.for("inheritable.error");
/** @internal Marks pollables produced by `inherit()` */
export const symbolInheritingPollable: unique symbol = Symbol.for(
  "inheritable.inheritingPollable",
);
