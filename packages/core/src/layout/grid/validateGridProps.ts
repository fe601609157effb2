/**
 * packages/core/src/layout/grid/validateGridProps.ts — Grid container props validation.
 *
 * Why: Converts user-facing grid props (numbers, percent strings, track list
 * strings) into an immutable GridContainerStyle once, so layout passes only
 * read typed values. Invalid props produce a structured fatal error instead
 * of throwing.
 *
 * Validation rules:
 *   - Sizes accept numbers >= 0, "<n>%" or "auto" (default "auto")
 *   - gap / rowGap / columnGap accept numbers >= 0 or "<n>%"; rowGap and
 *     columnGap default to gap, gap defaults to 0
 *   - A numeric templateColumns is that many `1fr` columns; a numeric
 *     templateRows is that many `auto` rows
 *   - Templates that parse but resolve to zero explicit tracks are kept and
 *     reported with a development warning
 */

import { I32_MAX, MAX_REPETITIONS } from "../engine/bounds.js";
import { type LayoutResult, invalid, ok } from "../engine/result.js";
import {
  AUTO_VALUE,
  type Dimension,
  type LengthPercentage,
  ZERO_LENGTH,
  lengthValue,
  percentValue,
} from "../style/dimension.js";
import { axisPair } from "../types.js";
import { type TemplateIssue, inspectTrackTemplate } from "./explicitGrid.js";
import { type TrackListPropName, parseAutoTrackList, parseTrackList } from "./parseTemplate.js";
import { type GridContainerStyle, createGridContainerStyle } from "./style.js";
import {
  type NonRepeatedTrackSizingFunction,
  type TrackSizingFunction,
  auto,
  fr,
  repeat,
} from "./trackSizing.js";

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";
const DEV_MODE = NODE_ENV !== "production";

function warnDev(message: string): void {
  if (!DEV_MODE) return;
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

/** Size value: cells, a percentage of the containing block, or "auto". */
export type GridSizeValue = number | `${number}%` | "auto";
export type GridGapValue = number | `${number}%`;

export type GridContainerProps = Readonly<{
  width?: GridSizeValue;
  height?: GridSizeValue;
  minWidth?: GridSizeValue;
  minHeight?: GridSizeValue;
  maxWidth?: GridSizeValue;
  maxHeight?: GridSizeValue;
  gap?: GridGapValue;
  rowGap?: GridGapValue;
  columnGap?: GridGapValue;
  templateColumns?: number | string;
  templateRows?: number | string;
  autoColumns?: string;
  autoRows?: string;
}>;

type SizePropName = "width" | "height" | "minWidth" | "minHeight" | "maxWidth" | "maxHeight";
type GapPropName = "gap" | "rowGap" | "columnGap";

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parsePercentToken(raw: string): LengthPercentage | null {
  const m = /^(\d+(?:\.\d+)?)%$/.exec(raw.trim());
  if (!m) return null;
  const n = Number.parseFloat(m[1] ?? "");
  if (!Number.isFinite(n) || n < 0) return null;
  return percentValue(n / 100);
}

function parseNonNegativeNumber(v: number): LengthPercentage | null {
  if (!Number.isFinite(v) || v < 0 || v > I32_MAX) return null;
  return lengthValue(v);
}

function parseSizeProp(name: SizePropName, raw: unknown): LayoutResult<Dimension> {
  if (raw === undefined) return ok(AUTO_VALUE);
  if (typeof raw === "number") {
    const parsed = parseNonNegativeNumber(raw);
    if (parsed) return ok(parsed);
  } else if (typeof raw === "string") {
    if (raw.trim().toLowerCase() === "auto") return ok(AUTO_VALUE);
    const parsed = parsePercentToken(raw);
    if (parsed) return ok(parsed);
  }
  return invalid(`grid.${name} must be a number >= 0, "<n>%" or "auto"`);
}

function parseGapProp(name: GapPropName, raw: unknown): LayoutResult<LengthPercentage> {
  if (typeof raw === "number") {
    const parsed = parseNonNegativeNumber(raw);
    if (parsed) return ok(parsed);
  } else if (typeof raw === "string") {
    const parsed = parsePercentToken(raw);
    if (parsed) return ok(parsed);
  }
  return invalid(`grid.${name} must be a number >= 0 or "<n>%"`);
}

function parseCount(name: TrackListPropName, raw: number): LayoutResult<number> {
  if (!Number.isFinite(raw) || raw < 1 || raw > MAX_REPETITIONS) {
    return invalid(
      `grid.${name} must be an integer from 1 to ${MAX_REPETITIONS} or a non-empty track string`,
    );
  }
  return ok(Math.floor(raw));
}

function parseTemplateProp(
  name: "templateColumns" | "templateRows",
  raw: unknown,
): LayoutResult<readonly TrackSizingFunction[]> {
  if (raw === undefined) return ok([]);
  if (typeof raw === "number") {
    const countRes = parseCount(name, raw);
    if (!countRes.ok) return countRes;
    const track = name === "templateColumns" ? fr(1) : auto();
    return ok([repeat(countRes.value, [track])]);
  }
  if (typeof raw === "string") return parseTrackList(name, raw);
  return invalid(
    `grid.${name} must be an integer from 1 to ${MAX_REPETITIONS} or a non-empty track string`,
  );
}

function parseAutoTracksProp(
  name: "autoColumns" | "autoRows",
  raw: unknown,
): LayoutResult<readonly NonRepeatedTrackSizingFunction[]> {
  if (raw === undefined) return ok([]);
  if (typeof raw === "string") return parseAutoTrackList(name, raw);
  return invalid(`grid.${name} must be a non-empty track string`);
}

function describeIssue(issue: TemplateIssue): string {
  switch (issue) {
    case "empty-repetition":
      return "a repeat() lists no tracks";
    case "multiple-auto-repetitions":
      return "only one auto-fill / auto-fit repeat() is allowed";
    case "auto-repetition-with-intrinsic-track":
      return "auto-fill / auto-fit requires every track to have a fixed minimum or maximum";
  }
}

function warnIfDegraded(
  name: "templateColumns" | "templateRows",
  raw: unknown,
  template: readonly TrackSizingFunction[],
): void {
  if (!DEV_MODE || template.length === 0) return;
  const { issue } = inspectTrackTemplate(template);
  if (issue === null) return;
  warnDev(
    `[gridwork][grid] grid.${name} "${String(raw)}" is ignored (${describeIssue(issue)}); ` +
      "the grid has no explicit tracks in this axis.",
  );
}

/**
 * Validate grid container props and build the style the track pass reads.
 */
export function validateGridContainerProps(
  props: GridContainerProps | unknown,
): LayoutResult<GridContainerStyle> {
  const p = props === undefined ? {} : props;
  if (!isRecord(p)) return invalid("grid props must be an object");

  const sizeNames = ["width", "height", "minWidth", "minHeight", "maxWidth", "maxHeight"] as const;
  const sizes: Partial<Record<SizePropName, Dimension>> = {};
  for (const name of sizeNames) {
    const res = parseSizeProp(name, p[name]);
    if (!res.ok) return res;
    sizes[name] = res.value;
  }

  const gapRes: LayoutResult<LengthPercentage> =
    p.gap === undefined ? ok(ZERO_LENGTH) : parseGapProp("gap", p.gap);
  if (!gapRes.ok) return gapRes;
  const rowGapRes = p.rowGap === undefined ? gapRes : parseGapProp("rowGap", p.rowGap);
  if (!rowGapRes.ok) return rowGapRes;
  const columnGapRes =
    p.columnGap === undefined ? gapRes : parseGapProp("columnGap", p.columnGap);
  if (!columnGapRes.ok) return columnGapRes;

  const columnsRes = parseTemplateProp("templateColumns", p.templateColumns);
  if (!columnsRes.ok) return columnsRes;
  const rowsRes = parseTemplateProp("templateRows", p.templateRows);
  if (!rowsRes.ok) return rowsRes;
  const autoColumnsRes = parseAutoTracksProp("autoColumns", p.autoColumns);
  if (!autoColumnsRes.ok) return autoColumnsRes;
  const autoRowsRes = parseAutoTracksProp("autoRows", p.autoRows);
  if (!autoRowsRes.ok) return autoRowsRes;

  warnIfDegraded("templateColumns", p.templateColumns, columnsRes.value);
  warnIfDegraded("templateRows", p.templateRows, rowsRes.value);

  return ok(
    createGridContainerStyle({
      size: axisPair(sizes.width ?? AUTO_VALUE, sizes.height ?? AUTO_VALUE),
      minSize: axisPair(sizes.minWidth ?? AUTO_VALUE, sizes.minHeight ?? AUTO_VALUE),
      maxSize: axisPair(sizes.maxWidth ?? AUTO_VALUE, sizes.maxHeight ?? AUTO_VALUE),
      gap: axisPair(columnGapRes.value, rowGapRes.value),
      gridTemplateColumns: columnsRes.value,
      gridTemplateRows: rowsRes.value,
      gridAutoColumns: autoColumnsRes.value,
      gridAutoRows: autoRowsRes.value,
    }),
  );
}
