/***
 *
 * Type Brand
 *
 * Tags and creation orders are both plain integers at runtime. The brand
 * keeps them from being passed for one another at compile time.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
