import { toCount } from "../engine/bounds.js";
import { type LengthPercentage, ZERO_LENGTH } from "../style/dimension.js";
import type { MaxTrackSizingFunction, MinTrackSizingFunction } from "./trackSizing.js";

export type GridTrackKind = "track" | "gutter";

/**
 * One entry of a materialized per-axis track list. Gutters are synthetic
 * tracks sized to the gap. A collapsed entry is sized to zero and is skipped
 * when free space is distributed between tracks.
 *
 * Entries are mutable so a node's buffer can be refilled in place across
 * layout passes.
 */
export type GridTrack = {
  kind: GridTrackKind;
  minTrackSizingFunction: MinTrackSizingFunction;
  maxTrackSizingFunction: MaxTrackSizingFunction;
  isCollapsed: boolean;
};

/** Track counts of one axis. Implicit counts come from item placement. */
export type TrackCounts = Readonly<{
  negativeImplicit: number;
  explicit: number;
  positiveImplicit: number;
}>;

export function createTrackCounts(
  negativeImplicit: number,
  explicit: number,
  positiveImplicit: number,
): TrackCounts {
  return Object.freeze({
    negativeImplicit: toCount(negativeImplicit),
    explicit: toCount(explicit),
    positiveImplicit: toCount(positiveImplicit),
  });
}

export function trackCountsLen(counts: TrackCounts): number {
  return counts.negativeImplicit + counts.explicit + counts.positiveImplicit;
}

/** Position of track `trackIndex` (0 = first negative implicit track) in the track/gutter list. */
export function trackBufferIndex(trackIndex: number): number {
  return 2 * trackIndex + 1;
}

/** Position of the gutter that precedes track `trackIndex` in the track/gutter list. */
export function gutterBufferIndex(trackIndex: number): number {
  return 2 * trackIndex;
}

export function createGridTrack(
  min: MinTrackSizingFunction,
  max: MaxTrackSizingFunction,
): GridTrack {
  return {
    kind: "track",
    minTrackSizingFunction: min,
    maxTrackSizingFunction: max,
    isCollapsed: false,
  };
}

export function createGutter(gap: LengthPercentage): GridTrack {
  return {
    kind: "gutter",
    minTrackSizingFunction: gap,
    maxTrackSizingFunction: gap,
    isCollapsed: false,
  };
}

export function collapseTrack(track: GridTrack): void {
  track.minTrackSizingFunction = ZERO_LENGTH;
  track.maxTrackSizingFunction = ZERO_LENGTH;
  track.isCollapsed = true;
}

/** Per-axis track buffers owned by one grid container, reused across passes. */
export type GridTrackBuffers = {
  columns: GridTrack[];
  rows: GridTrack[];
};

export function createGridTrackBuffers(): GridTrackBuffers {
  return { columns: [], rows: [] };
}
