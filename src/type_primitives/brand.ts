/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only prevents
 * accidental assignment between structurally identical types.
 *
 * Example: a Position and a capacity are both numbers at runtime, but
 * Brand<number, "position"> cannot be passed where a plain count was
 * branded differently, and a bare number cannot be passed as a Position.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
