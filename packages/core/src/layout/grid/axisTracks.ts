import type { CalcResolver } from "../style/dimension.js";
import type { AbsoluteAxis } from "../types.js";
import { computeExplicitGridSizeInAxis, initializeGridTracks } from "./explicitGrid.js";
import { type GridContainerStyle, autoTracksInAxis, gapInAxis, templateInAxis } from "./style.js";
import { type GridTrack, type TrackCounts, createTrackCounts } from "./types.js";

/** Implicit track counts reported by item placement for one axis. */
export type ImplicitTrackCounts = Readonly<{
  negativeImplicit: number;
  positiveImplicit: number;
}>;

export const NO_IMPLICIT_TRACKS: ImplicitTrackCounts = Object.freeze({
  negativeImplicit: 0,
  positiveImplicit: 0,
});

/**
 * Resolve the explicit track count of `axis` and write its track list into
 * `buffer`. Returns the counts the list was built from.
 */
export function computeGridAxisTracks(
  buffer: GridTrack[],
  style: GridContainerStyle,
  axis: AbsoluteAxis,
  innerContainerSize: number | null,
  implicit: ImplicitTrackCounts,
  trackHasItems: (trackIndex: number) => boolean,
  resolveCalc: CalcResolver,
): TrackCounts {
  const template = templateInAxis(style, axis);
  const explicit = computeExplicitGridSizeInAxis(
    style,
    template,
    innerContainerSize,
    resolveCalc,
    axis,
  );
  const counts = createTrackCounts(implicit.negativeImplicit, explicit, implicit.positiveImplicit);
  initializeGridTracks(
    buffer,
    counts,
    template,
    autoTracksInAxis(style, axis),
    gapInAxis(style, axis),
    trackHasItems,
  );
  return counts;
}
