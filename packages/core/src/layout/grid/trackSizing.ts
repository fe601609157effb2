/**
 * packages/core/src/layout/grid/trackSizing.ts — Track sizing functions.
 *
 * Why: A grid track is constrained by a minimum and a maximum sizing function.
 * Template entries are either a single track or a repeated list of tracks; the
 * repetition count is a fixed number or resolved from available space
 * (auto-fill / auto-fit).
 */

import { MAX_REPETITIONS, toCount } from "../engine/bounds.js";
import {
  AUTO_VALUE,
  type AutoValue,
  type CalcId,
  type CalcResolver,
  type LengthPercentage,
  calcValue,
  isLengthPercentage,
  lengthValue,
  maybeResolveLengthPercentage,
  percentValue,
} from "../style/dimension.js";

export type MinContentValue = Readonly<{ kind: "min-content" }>;
export type MaxContentValue = Readonly<{ kind: "max-content" }>;
export type FitContentValue = Readonly<{ kind: "fit-content"; limit: LengthPercentage }>;
export type FrValue = Readonly<{ kind: "fr"; flex: number }>;

export type MinTrackSizingFunction =
  | LengthPercentage
  | AutoValue
  | MinContentValue
  | MaxContentValue;

export type MaxTrackSizingFunction = MinTrackSizingFunction | FitContentValue | FrValue;

/** One track: `min` / `max` sizing functions. Also the element type of repeats and auto tracks. */
export type NonRepeatedTrackSizingFunction = Readonly<{
  kind: "single";
  min: MinTrackSizingFunction;
  max: MaxTrackSizingFunction;
}>;

export type GridTrackRepetition =
  | Readonly<{ kind: "count"; count: number }>
  | Readonly<{ kind: "auto-fill" }>
  | Readonly<{ kind: "auto-fit" }>;

export type RepeatedTracks = Readonly<{
  kind: "repeat";
  repetition: GridTrackRepetition;
  tracks: readonly NonRepeatedTrackSizingFunction[];
}>;

/** A single entry of `grid-template-columns` / `grid-template-rows`. */
export type TrackSizingFunction = NonRepeatedTrackSizingFunction | RepeatedTracks;

const MIN_CONTENT: MinContentValue = Object.freeze({ kind: "min-content" });
const MAX_CONTENT: MaxContentValue = Object.freeze({ kind: "max-content" });

export const AUTO_FILL: GridTrackRepetition = Object.freeze({ kind: "auto-fill" });
export const AUTO_FIT: GridTrackRepetition = Object.freeze({ kind: "auto-fit" });

function track(
  min: MinTrackSizingFunction,
  max: MaxTrackSizingFunction,
): NonRepeatedTrackSizingFunction {
  return Object.freeze({ kind: "single", min, max });
}

/* ---------- Builders ---------- */

export function length(value: number): NonRepeatedTrackSizingFunction {
  const v = lengthValue(value);
  return track(v, v);
}

/** `fraction` of the container size (0.5 = 50%). */
export function percent(fraction: number): NonRepeatedTrackSizingFunction {
  const v = percentValue(fraction);
  return track(v, v);
}

export function calc(id: CalcId): NonRepeatedTrackSizingFunction {
  const v = calcValue(id);
  return track(v, v);
}

export const AUTO_TRACK: NonRepeatedTrackSizingFunction = track(AUTO_VALUE, AUTO_VALUE);

export function auto(): NonRepeatedTrackSizingFunction {
  return AUTO_TRACK;
}

export function minContent(): NonRepeatedTrackSizingFunction {
  return track(MIN_CONTENT, MIN_CONTENT);
}

export function maxContent(): NonRepeatedTrackSizingFunction {
  return track(MAX_CONTENT, MAX_CONTENT);
}

/** fit-content(limit): sized like `auto`, capped at `limit`. */
export function fitContent(limit: LengthPercentage): NonRepeatedTrackSizingFunction {
  return track(AUTO_VALUE, Object.freeze({ kind: "fit-content", limit }));
}

/** Flexible track. The minimum of a bare `fr` track is `auto`. */
export function fr(flex: number): NonRepeatedTrackSizingFunction {
  return track(AUTO_VALUE, Object.freeze({ kind: "fr", flex }));
}

export function minmax(
  min: MinTrackSizingFunction,
  max: MaxTrackSizingFunction,
): NonRepeatedTrackSizingFunction {
  return track(min, max);
}

export function count(n: number): GridTrackRepetition {
  return Object.freeze({ kind: "count", count: n });
}

export function repeat(
  repetition: GridTrackRepetition | number,
  tracks: readonly NonRepeatedTrackSizingFunction[],
): RepeatedTracks {
  return Object.freeze({
    kind: "repeat",
    repetition: typeof repetition === "number" ? count(repetition) : repetition,
    tracks: Object.freeze([...tracks]),
  });
}

/* ---------- Queries ---------- */

export function isAutoRepetition(def: TrackSizingFunction): boolean {
  return def.kind === "repeat" && def.repetition.kind !== "count";
}

/**
 * Fixed repetition count floored to a non-negative integer and capped at
 * MAX_REPETITIONS; 0 for auto repetitions.
 */
export function fixedRepetitionCount(repetition: GridTrackRepetition): number {
  if (repetition.kind !== "count") return 0;
  return Math.min(toCount(repetition.count), MAX_REPETITIONS);
}

/** True when min or max is a length, percentage or calc value. */
export function hasFixedComponent(fn: NonRepeatedTrackSizingFunction): boolean {
  return isLengthPercentage(fn.min) || isLengthPercentage(fn.max);
}

function definiteComponent(
  v: MinTrackSizingFunction | MaxTrackSizingFunction,
  parentSize: number | null,
  resolveCalc: CalcResolver,
): number | null {
  if (!isLengthPercentage(v)) return null;
  return maybeResolveLengthPercentage(v, parentSize, resolveCalc);
}

/**
 * Space a track is assumed to take when counting auto repetitions: the max
 * function if definite (floored by the min when that is definite too),
 * otherwise the min function.
 *
 * Returns 0 when neither component is definite; templates with such tracks
 * are rejected before this is reached.
 */
export function definiteValue(
  fn: NonRepeatedTrackSizingFunction,
  parentSize: number | null,
  resolveCalc: CalcResolver,
): number {
  const max = definiteComponent(fn.max, parentSize, resolveCalc);
  const min = definiteComponent(fn.min, parentSize, resolveCalc);
  if (max !== null) return min !== null ? Math.max(max, min) : max;
  return min ?? 0;
}
