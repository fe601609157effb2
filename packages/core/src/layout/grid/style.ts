import {
  AUTO_VALUE,
  type Dimension,
  type LengthPercentage,
  ZERO_LENGTH,
} from "../style/dimension.js";
import { type AbsoluteAxis, type AxisPair, axisPair, getAbs } from "../types.js";
import type { NonRepeatedTrackSizingFunction, TrackSizingFunction } from "./trackSizing.js";

/**
 * Style of a grid container as read by the track generation pass.
 *
 * `gap.width` is the column gap (between horizontal tracks) and `gap.height`
 * the row gap.
 */
export interface GridContainerStyle {
  readonly size: AxisPair<Dimension>;
  readonly minSize: AxisPair<Dimension>;
  readonly maxSize: AxisPair<Dimension>;
  readonly gap: AxisPair<LengthPercentage>;
  readonly gridTemplateColumns: readonly TrackSizingFunction[];
  readonly gridTemplateRows: readonly TrackSizingFunction[];
  readonly gridAutoColumns: readonly NonRepeatedTrackSizingFunction[];
  readonly gridAutoRows: readonly NonRepeatedTrackSizingFunction[];
}

const AUTO_PAIR = axisPair<Dimension>(AUTO_VALUE, AUTO_VALUE);
const EMPTY_TEMPLATE: readonly TrackSizingFunction[] = Object.freeze([]);
const EMPTY_AUTO_TRACKS: readonly NonRepeatedTrackSizingFunction[] = Object.freeze([]);

export const DEFAULT_GRID_CONTAINER_STYLE: GridContainerStyle = Object.freeze({
  size: AUTO_PAIR,
  minSize: AUTO_PAIR,
  maxSize: AUTO_PAIR,
  gap: axisPair<LengthPercentage>(ZERO_LENGTH, ZERO_LENGTH),
  gridTemplateColumns: EMPTY_TEMPLATE,
  gridTemplateRows: EMPTY_TEMPLATE,
  gridAutoColumns: EMPTY_AUTO_TRACKS,
  gridAutoRows: EMPTY_AUTO_TRACKS,
});

/** Build a style from a partial description; omitted fields take the defaults. */
export function createGridContainerStyle(
  overrides: Partial<GridContainerStyle> = {},
): GridContainerStyle {
  return Object.freeze({ ...DEFAULT_GRID_CONTAINER_STYLE, ...overrides });
}

export function templateInAxis(
  style: GridContainerStyle,
  axis: AbsoluteAxis,
): readonly TrackSizingFunction[] {
  return axis === "horizontal" ? style.gridTemplateColumns : style.gridTemplateRows;
}

export function autoTracksInAxis(
  style: GridContainerStyle,
  axis: AbsoluteAxis,
): readonly NonRepeatedTrackSizingFunction[] {
  return axis === "horizontal" ? style.gridAutoColumns : style.gridAutoRows;
}

export function gapInAxis(style: GridContainerStyle, axis: AbsoluteAxis): LengthPercentage {
  return getAbs(style.gap, axis);
}
