/**
 * packages/core/src/layout/style/dimension.ts — Length, percentage and calc values.
 *
 * Why: Style values stay symbolic until a layout pass supplies the reference
 * size they resolve against. `calc` values are opaque handles evaluated by the
 * caller's `CalcResolver`.
 */

/** Opaque handle to a calc() expression owned by the surrounding engine. */
export type CalcId = number;

/** Evaluates the calc expression `id` against the reference size `basis`. */
export type CalcResolver = (id: CalcId, basis: number) => number;

export type LengthValue = Readonly<{ kind: "length"; value: number }>;
/** `value` is a fraction: 0.5 means 50%. */
export type PercentValue = Readonly<{ kind: "percent"; value: number }>;
export type CalcValue = Readonly<{ kind: "calc"; id: CalcId }>;
export type AutoValue = Readonly<{ kind: "auto" }>;

export type LengthPercentage = LengthValue | PercentValue | CalcValue;
export type Dimension = LengthPercentage | AutoValue;

export const ZERO_LENGTH: LengthValue = Object.freeze({ kind: "length", value: 0 });
export const AUTO_VALUE: AutoValue = Object.freeze({ kind: "auto" });

export function lengthValue(value: number): LengthValue {
  return Object.freeze({ kind: "length", value });
}

export function percentValue(fraction: number): PercentValue {
  return Object.freeze({ kind: "percent", value: fraction });
}

export function calcValue(id: CalcId): CalcValue {
  return Object.freeze({ kind: "calc", id });
}

export function isLengthPercentage(v: Readonly<{ kind: string }>): v is LengthPercentage {
  return v.kind === "length" || v.kind === "percent" || v.kind === "calc";
}

/**
 * Resolve a length-percentage against an optional parent size.
 * Percentages and calc values are indefinite without a parent size.
 */
export function maybeResolveLengthPercentage(
  v: LengthPercentage,
  parentSize: number | null,
  resolveCalc: CalcResolver,
): number | null {
  switch (v.kind) {
    case "length":
      return v.value;
    case "percent":
      return parentSize === null ? null : v.value * parentSize;
    case "calc":
      return parentSize === null ? null : resolveCalc(v.id, parentSize);
  }
}

export function maybeResolveDimension(
  v: Dimension,
  parentSize: number | null,
  resolveCalc: CalcResolver,
): number | null {
  if (v.kind === "auto") return null;
  return maybeResolveLengthPercentage(v, parentSize, resolveCalc);
}

export function resolveLengthPercentageOrZero(
  v: LengthPercentage,
  parentSize: number | null,
  resolveCalc: CalcResolver,
): number {
  return maybeResolveLengthPercentage(v, parentSize, resolveCalc) ?? 0;
}
