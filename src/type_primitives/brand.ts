/***
 * Brand — Nominal typing for plain numbers.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property.
 * The symbol never exists at runtime; it only keeps EntityID, ComponentID,
 * SystemID and ArchetypeID from being passed for one another.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
