/**
 * @gridwork/core
 *
 * Runtime-agnostic layout geometry: grid track generation.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Geometry and style values
// =============================================================================

export {
  type AbsoluteAxis,
  type AxisPair,
  type Size,
  axisPair,
  getAbs,
} from "./layout/types.js";

export {
  type AutoValue,
  type CalcId,
  type CalcResolver,
  type CalcValue,
  type Dimension,
  type LengthPercentage,
  type LengthValue,
  type PercentValue,
  AUTO_VALUE,
  ZERO_LENGTH,
  calcValue,
  lengthValue,
  maybeResolveDimension,
  maybeResolveLengthPercentage,
  percentValue,
  resolveLengthPercentageOrZero,
} from "./layout/style/dimension.js";

export { type InvalidPropsFatal, type LayoutResult } from "./layout/engine/result.js";

// =============================================================================
// Track sizing functions
// =============================================================================

export {
  type FitContentValue,
  type FrValue,
  type GridTrackRepetition,
  type MaxContentValue,
  type MaxTrackSizingFunction,
  type MinContentValue,
  type MinTrackSizingFunction,
  type NonRepeatedTrackSizingFunction,
  type RepeatedTracks,
  type TrackSizingFunction,
  AUTO_FILL,
  AUTO_FIT,
  AUTO_TRACK,
  auto,
  calc,
  count,
  definiteValue,
  fitContent,
  fixedRepetitionCount,
  fr,
  hasFixedComponent,
  isAutoRepetition,
  length,
  maxContent,
  minContent,
  minmax,
  percent,
  repeat,
} from "./layout/grid/trackSizing.js";

// =============================================================================
// Grid tracks
// =============================================================================

export {
  type GridTrack,
  type GridTrackBuffers,
  type GridTrackKind,
  type TrackCounts,
  collapseTrack,
  createGridTrack,
  createGridTrackBuffers,
  createGutter,
  createTrackCounts,
  gutterBufferIndex,
  trackBufferIndex,
  trackCountsLen,
} from "./layout/grid/types.js";

export {
  type GridContainerStyle,
  DEFAULT_GRID_CONTAINER_STYLE,
  autoTracksInAxis,
  createGridContainerStyle,
  gapInAxis,
  templateInAxis,
} from "./layout/grid/style.js";

export {
  type TemplateInspection,
  type TemplateIssue,
  MAX_AUTO_REPETITIONS,
  computeExplicitGridSizeInAxis,
  gridTrackListLength,
  initializeGridTracks,
  inspectTrackTemplate,
} from "./layout/grid/explicitGrid.js";

export {
  type ImplicitTrackCounts,
  NO_IMPLICIT_TRACKS,
  computeGridAxisTracks,
} from "./layout/grid/axisTracks.js";

// =============================================================================
// Props
// =============================================================================

export {
  type TrackListPropName,
  parseAutoTrackList,
  parseTrackList,
} from "./layout/grid/parseTemplate.js";

export {
  type GridContainerProps,
  type GridGapValue,
  type GridSizeValue,
  validateGridContainerProps,
} from "./layout/grid/validateGridProps.js";
