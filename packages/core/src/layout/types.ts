/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric vocabulary shared by the grid modules. Sizes are
 * plain numbers in layout units; absent (indefinite) sizes are `null`.
 */

/** Physical axis. Grid columns run along `horizontal`, rows along `vertical`. */
export type AbsoluteAxis = "horizontal" | "vertical";

/** A value per physical axis: `width` is horizontal, `height` is vertical. */
export type AxisPair<T> = Readonly<{ width: T; height: T }>;

/** Size dimensions in layout units. */
export type Size = AxisPair<number>;

export function getAbs<T>(pair: AxisPair<T>, axis: AbsoluteAxis): T {
  return axis === "horizontal" ? pair.width : pair.height;
}

export function axisPair<T>(width: T, height: T): AxisPair<T> {
  return Object.freeze({ width, height });
}
