/**
 * packages/core/src/layout/grid/explicitGrid.ts — Explicit grid size and track list.
 *
 * Why: Before tracks can be sized, each axis needs (1) the number of explicit
 * tracks its template produces, resolving at most one auto-fill / auto-fit
 * repetition against the available space, and (2) the ordered list of
 * tracks and gutters covering negative implicit, explicit and positive
 * implicit tracks.
 *
 * Invariants:
 *   - An invalid template yields zero explicit tracks; nothing here throws.
 *   - An auto repetition appears at least once.
 *   - The track list has length 2 * trackCount + 1, starts and ends with a
 *     collapsed gutter and alternates track / gutter in between.
 */

import { MAX_REPETITIONS } from "../engine/bounds.js";
import {
  type CalcResolver,
  type LengthPercentage,
  ZERO_LENGTH,
  maybeResolveDimension,
  resolveLengthPercentageOrZero,
} from "../style/dimension.js";
import { type AbsoluteAxis, getAbs } from "../types.js";
import type { GridContainerStyle } from "./style.js";
import {
  AUTO_TRACK,
  type MaxTrackSizingFunction,
  type MinTrackSizingFunction,
  type NonRepeatedTrackSizingFunction,
  type RepeatedTracks,
  type TrackSizingFunction,
  definiteValue,
  fixedRepetitionCount,
  hasFixedComponent,
  isAutoRepetition,
} from "./trackSizing.js";
import {
  type GridTrack,
  type GridTrackKind,
  type TrackCounts,
  collapseTrack,
  trackCountsLen,
} from "./types.js";

/** Upper bound on resolved auto repetitions. */
export const MAX_AUTO_REPETITIONS = MAX_REPETITIONS;

export type TemplateIssue =
  | "empty-repetition"
  | "multiple-auto-repetitions"
  | "auto-repetition-with-intrinsic-track";

export type TemplateInspection = Readonly<{
  /** Tracks produced by singles and fixed-count repeats. */
  fixedTrackCount: number;
  /** The auto-fill / auto-fit entry, when the template has exactly one. */
  autoRepetition: RepeatedTracks | null;
  /** Why the template contributes no explicit tracks, or null when it is usable. */
  issue: TemplateIssue | null;
}>;

export function inspectTrackTemplate(template: readonly TrackSizingFunction[]): TemplateInspection {
  let fixedTrackCount = 0;
  let autoRepetitionCount = 0;
  let autoRepetition: RepeatedTracks | null = null;
  let hasEmptyRepetition = false;
  let allTracksHaveFixedComponent = true;

  for (let i = 0; i < template.length; i++) {
    const def = template[i];
    if (!def) continue;

    if (def.kind === "single") {
      fixedTrackCount += 1;
      if (!hasFixedComponent(def)) allTracksHaveFixedComponent = false;
      continue;
    }

    if (def.tracks.length === 0) hasEmptyRepetition = true;
    if (isAutoRepetition(def)) {
      autoRepetitionCount++;
      autoRepetition = def;
    } else {
      fixedTrackCount += fixedRepetitionCount(def.repetition) * def.tracks.length;
    }
    for (let j = 0; j < def.tracks.length; j++) {
      const fn = def.tracks[j];
      if (fn && !hasFixedComponent(fn)) allTracksHaveFixedComponent = false;
    }
  }

  let issue: TemplateIssue | null = null;
  if (hasEmptyRepetition) issue = "empty-repetition";
  else if (autoRepetitionCount > 1) issue = "multiple-auto-repetitions";
  else if (autoRepetitionCount === 1 && !allTracksHaveFixedComponent) {
    issue = "auto-repetition-with-intrinsic-track";
  }

  return {
    fixedTrackCount,
    autoRepetition: autoRepetitionCount === 1 ? autoRepetition : null,
    issue,
  };
}

function sumDefiniteValues(
  tracks: readonly NonRepeatedTrackSizingFunction[],
  parentSize: number,
  resolveCalc: CalcResolver,
): number {
  let total = 0;
  for (let i = 0; i < tracks.length; i++) {
    const fn = tracks[i];
    if (!fn) continue;
    total += definiteValue(fn, parentSize, resolveCalc);
  }
  return total;
}

/**
 * Whether the container's preferred or maximum size is definite in `axis`.
 * When it is, auto repetitions must not overflow; otherwise only the minimum
 * size constrains them and they must cover it.
 */
function sizeIsMaximum(
  style: GridContainerStyle,
  axis: AbsoluteAxis,
  innerContainerSize: number | null,
  resolveCalc: CalcResolver,
): boolean {
  const size = getAbs(style.size, axis);
  if (maybeResolveDimension(size, innerContainerSize, resolveCalc) !== null) return true;
  const maxSize = getAbs(style.maxSize, axis);
  return maybeResolveDimension(maxSize, innerContainerSize, resolveCalc) !== null;
}

function resolveRepetitionCount(
  style: GridContainerStyle,
  template: readonly TrackSizingFunction[],
  inspection: TemplateInspection,
  repeatedTracks: readonly NonRepeatedTrackSizingFunction[],
  innerContainerSize: number,
  resolveCalc: CalcResolver,
  axis: AbsoluteAxis,
): number {
  let nonRepeatingSpace = 0;
  for (let i = 0; i < template.length; i++) {
    const def = template[i];
    if (!def) continue;
    if (def.kind === "single") {
      nonRepeatingSpace += definiteValue(def, innerContainerSize, resolveCalc);
    } else if (!isAutoRepetition(def)) {
      const once = sumDefiniteValues(def.tracks, innerContainerSize, resolveCalc);
      nonRepeatingSpace += once * fixedRepetitionCount(def.repetition);
    }
  }

  const gapStyle = getAbs(style.gap, axis);
  const gap = resolveLengthPercentageOrZero(gapStyle, innerContainerSize, resolveCalc);
  const perRepetitionSpace = sumDefiniteValues(repeatedTracks, innerContainerSize, resolveCalc);
  const repeatedTrackCount = repeatedTracks.length;

  // The first repetition is special-cased: its gap count depends on the
  // number of non-repeating tracks.
  const firstGapCount = Math.max(0, inspection.fixedTrackCount + repeatedTrackCount - 1);
  const firstRepetitionSpace = nonRepeatingSpace + perRepetitionSpace + gap * firstGapCount;
  if (firstRepetitionSpace > innerContainerSize) return 1;

  const perRepetitionWithGaps = perRepetitionSpace + gap * repeatedTrackCount;
  if (!(perRepetitionWithGaps > 0)) return 1;

  const extra = (innerContainerSize - firstRepetitionSpace) / perRepetitionWithGaps;
  // An unbounded container fits as many repetitions as are allowed.
  if (extra === Number.POSITIVE_INFINITY) return MAX_AUTO_REPETITIONS;
  if (!Number.isFinite(extra)) return 1;

  const additional = sizeIsMaximum(style, axis, innerContainerSize, resolveCalc)
    ? Math.floor(extra)
    : Math.ceil(extra);
  return Math.min(additional + 1, MAX_AUTO_REPETITIONS);
}

/**
 * Number of explicit tracks `template` produces in `axis`.
 *
 * With an auto-fill / auto-fit repetition and a definite `innerContainerSize`
 * the repetition count is the largest that does not overflow the container
 * (when its preferred or max size is definite) or the smallest that covers it
 * (when only its min size is). Without a definite size it repeats once.
 */
export function computeExplicitGridSizeInAxis(
  style: GridContainerStyle,
  template: readonly TrackSizingFunction[],
  innerContainerSize: number | null,
  resolveCalc: CalcResolver,
  axis: AbsoluteAxis,
): number {
  if (template.length === 0) return 0;

  const inspection = inspectTrackTemplate(template);
  if (inspection.issue !== null) return 0;

  const autoRepetition = inspection.autoRepetition;
  if (autoRepetition === null) return inspection.fixedTrackCount;

  const repeatedTracks = autoRepetition.tracks;
  const repetitions =
    innerContainerSize === null
      ? 1
      : resolveRepetitionCount(
          style,
          template,
          inspection,
          repeatedTracks,
          innerContainerSize,
          resolveCalc,
          axis,
        );

  return inspection.fixedTrackCount + repeatedTracks.length * repetitions;
}

/* ---------- Track list materialization ---------- */

/**
 * Write one entry at `index`, reusing the object already in the buffer.
 * Returns the next write index.
 */
function writeTrack(
  tracks: GridTrack[],
  index: number,
  kind: GridTrackKind,
  min: MinTrackSizingFunction,
  max: MaxTrackSizingFunction,
  isCollapsed: boolean,
): number {
  const existing = tracks[index];
  if (existing) {
    existing.kind = kind;
    existing.minTrackSizingFunction = min;
    existing.maxTrackSizingFunction = max;
    existing.isCollapsed = isCollapsed;
  } else {
    tracks.push({ kind, minTrackSizingFunction: min, maxTrackSizingFunction: max, isCollapsed });
  }
  return index + 1;
}

function writeTrackAndGutter(
  tracks: GridTrack[],
  index: number,
  fn: NonRepeatedTrackSizingFunction,
  gap: LengthPercentage,
  isCollapsed: boolean,
): number {
  const next = writeTrack(tracks, index, "track", fn.min, fn.max, isCollapsed);
  return writeTrack(tracks, next, "gutter", gap, gap, isCollapsed);
}

function writeImplicitTracks(
  tracks: GridTrack[],
  index: number,
  trackCount: number,
  autoTracks: readonly NonRepeatedTrackSizingFunction[],
  cycleOffset: number,
  gap: LengthPercentage,
): number {
  let cursor = index;
  for (let i = 0; i < trackCount; i++) {
    const fn =
      autoTracks.length === 0
        ? AUTO_TRACK
        : (autoTracks[(cycleOffset + i) % autoTracks.length] ?? AUTO_TRACK);
    cursor = writeTrackAndGutter(tracks, cursor, fn, gap, false);
  }
  return cursor;
}

/**
 * Fill `tracks` with the track / gutter list of one axis.
 *
 * The buffer belongs to the caller and is refilled in place: existing entries
 * are overwritten and surplus entries dropped. `trackHasItems` receives the
 * index of a track within the whole axis (negative implicit tracks first)
 * and decides whether an auto-fit track stays or collapses.
 *
 * `counts.explicit` must come from `computeExplicitGridSizeInAxis` for the
 * same template; the template is not re-validated here.
 */
export function initializeGridTracks(
  tracks: GridTrack[],
  counts: TrackCounts,
  template: readonly TrackSizingFunction[],
  autoTracks: readonly NonRepeatedTrackSizingFunction[],
  gap: LengthPercentage,
  trackHasItems: (trackIndex: number) => boolean,
): void {
  let cursor = writeTrack(tracks, 0, "gutter", gap, gap, false);

  // Negative implicit tracks cycle backwards from the explicit grid: the track
  // adjacent to it uses the last auto track definition.
  const negativeOffset =
    autoTracks.length === 0
      ? 0
      : autoTracks.length - (counts.negativeImplicit % autoTracks.length);
  cursor = writeImplicitTracks(
    tracks,
    cursor,
    counts.negativeImplicit,
    autoTracks,
    negativeOffset,
    gap,
  );

  let trackIndex = counts.negativeImplicit;

  // A zero count also covers a non-empty template that failed validation.
  if (counts.explicit > 0) {
    let fixedTrackCount = 0;
    for (let i = 0; i < template.length; i++) {
      const def = template[i];
      if (def && !isAutoRepetition(def)) {
        fixedTrackCount +=
          def.kind === "single" ? 1 : fixedRepetitionCount(def.repetition) * def.tracks.length;
      }
    }

    for (let i = 0; i < template.length; i++) {
      const def = template[i];
      if (!def) continue;

      if (def.kind === "single") {
        cursor = writeTrackAndGutter(tracks, cursor, def, gap, false);
        trackIndex++;
        continue;
      }

      const repeated = def.tracks;
      if (repeated.length === 0) continue;

      const isAuto = isAutoRepetition(def);
      const generated = isAuto
        ? Math.max(0, counts.explicit - fixedTrackCount)
        : fixedRepetitionCount(def.repetition) * repeated.length;
      const collapsible = def.repetition.kind === "auto-fit";

      for (let j = 0; j < generated; j++) {
        const fn = repeated[j % repeated.length] ?? AUTO_TRACK;
        const isCollapsed = collapsible && !trackHasItems(trackIndex);
        if (isCollapsed) {
          // An auto-fit track without items disappears along with its gutter.
          cursor = writeTrack(tracks, cursor, "track", ZERO_LENGTH, ZERO_LENGTH, true);
          cursor = writeTrack(tracks, cursor, "gutter", ZERO_LENGTH, ZERO_LENGTH, true);
        } else {
          cursor = writeTrackAndGutter(tracks, cursor, fn, gap, false);
        }
        trackIndex++;
      }
    }
  }

  cursor = writeImplicitTracks(tracks, cursor, counts.positiveImplicit, autoTracks, 0, gap);
  tracks.length = cursor;

  // The outer grid lines are boundaries, not gaps.
  const first = tracks[0];
  const last = tracks[tracks.length - 1];
  if (first) collapseTrack(first);
  if (last) collapseTrack(last);
}

/** Expected length of the list written by `initializeGridTracks`. */
export function gridTrackListLength(counts: TrackCounts): number {
  return trackCountsLen(counts) * 2 + 1;
}
