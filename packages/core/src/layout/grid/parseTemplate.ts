/**
 * packages/core/src/layout/grid/parseTemplate.ts — Track list string parsing.
 *
 * Why: Lets grid props be written the way CSS writes track lists, e.g.
 * `"100 minmax(40px, 2fr) repeat(auto-fill, 40px 20%)"`.
 *
 * Accepted tokens:
 *   - `<n>` / `<n>px`, `<n>%`, `<n>fr` / `fr`
 *   - `auto`, `min-content`, `max-content`
 *   - `fit-content(<n> | <n>px | <n>%)`
 *   - `minmax(<min>, <max>)` (`fr` is not a valid minimum)
 *   - `repeat(<count> | auto-fill | auto-fit, <tracks>)`, not nested
 *
 * Tokens are separated by whitespace or top-level commas.
 */

import { I32_MAX, MAX_REPETITIONS } from "../engine/bounds.js";
import { type LayoutResult, invalid, ok } from "../engine/result.js";
import {
  AUTO_VALUE,
  type LengthPercentage,
  lengthValue,
  percentValue,
} from "../style/dimension.js";
import {
  AUTO_FILL,
  AUTO_FIT,
  type GridTrackRepetition,
  type MaxTrackSizingFunction,
  type MinTrackSizingFunction,
  type NonRepeatedTrackSizingFunction,
  type TrackSizingFunction,
  auto,
  count,
  fitContent,
  fr,
  maxContent,
  minContent,
  minmax,
  repeat,
} from "./trackSizing.js";

export type TrackListPropName = "templateColumns" | "templateRows" | "autoColumns" | "autoRows";

const TRACK_TOKEN_FORMS =
  '"auto", "min-content", "max-content", "<n>", "<n>px", "<n>%", "<n>fr", ' +
  '"minmax(<min>, <max>)" or "fit-content(<n>)"';

const FUNCTION_RE = /^([a-z-]+)\((.*)\)$/s;
const LENGTH_RE = /^(\d+(?:\.\d+)?)(px)?$/;
const PERCENT_RE = /^(\d+(?:\.\d+)?)%$/;

/**
 * Split on whitespace (and commas, when `commas` is set) outside parentheses.
 * Returns null when parentheses are unbalanced.
 */
function splitTopLevel(raw: string, commas: boolean): string[] | null {
  const out: string[] = [];
  let depth = 0;
  let current = "";
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i] ?? "";
    if (ch === "(") depth++;
    if (ch === ")") {
      depth--;
      if (depth < 0) return null;
    }
    const isSeparator = depth === 0 && (/\s/.test(ch) || (commas && ch === ","));
    if (isSeparator) {
      if (current.length > 0) out.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  if (depth !== 0) return null;
  if (current.length > 0) out.push(current);
  return out;
}

/** Split function arguments on top-level commas, keeping empty arguments. */
function splitArguments(raw: string): string[] {
  const out: string[] = [];
  let depth = 0;
  let current = "";
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i] ?? "";
    if (ch === "(") depth++;
    if (ch === ")") depth--;
    if (depth === 0 && ch === ",") {
      out.push(current.trim());
      current = "";
      continue;
    }
    current += ch;
  }
  out.push(current.trim());
  return out;
}

function parseNumber(raw: string | undefined): number | null {
  const n = Number.parseFloat(raw ?? "");
  if (!Number.isFinite(n) || n < 0 || n > I32_MAX) return null;
  return n;
}

function parseLengthPercentage(token: string): LengthPercentage | null {
  const lengthMatch = LENGTH_RE.exec(token);
  if (lengthMatch) {
    const n = parseNumber(lengthMatch[1]);
    return n === null ? null : lengthValue(n);
  }
  const percentMatch = PERCENT_RE.exec(token);
  if (percentMatch) {
    const n = parseNumber(percentMatch[1]);
    return n === null ? null : percentValue(n / 100);
  }
  return null;
}

function parseFlex(token: string): number | null {
  if (!token.endsWith("fr")) return null;
  const flexRaw = token.slice(0, -2);
  if (flexRaw.length === 0) return 1;
  if (!/^\d+(?:\.\d+)?$/.test(flexRaw)) return null;
  const flex = parseNumber(flexRaw);
  return flex !== null && flex > 0 ? flex : null;
}

function parseMinFunction(token: string): MinTrackSizingFunction | null {
  if (token === "auto") return AUTO_VALUE;
  if (token === "min-content") return { kind: "min-content" };
  if (token === "max-content") return { kind: "max-content" };
  return parseLengthPercentage(token);
}

function parseMaxFunction(token: string): MaxTrackSizingFunction | null {
  const min = parseMinFunction(token);
  if (min) return min;
  const flex = parseFlex(token);
  if (flex !== null) return { kind: "fr", flex };
  const fn = FUNCTION_RE.exec(token);
  if (fn && fn[1] === "fit-content") {
    const limit = parseLengthPercentage((fn[2] ?? "").trim());
    return limit ? { kind: "fit-content", limit } : null;
  }
  return null;
}

function invalidToken(propName: TrackListPropName, token: string): LayoutResult<never> {
  return invalid(`grid.${propName} track token "${token}" must be ${TRACK_TOKEN_FORMS}`);
}

function parseSingleTrack(
  propName: TrackListPropName,
  token: string,
): LayoutResult<NonRepeatedTrackSizingFunction> {
  if (token === "min-content") return ok(minContent());
  if (token === "max-content") return ok(maxContent());

  const flex = parseFlex(token);
  if (flex !== null) return ok(fr(flex));

  const lp = parseLengthPercentage(token);
  if (lp) return ok(minmax(lp, lp));
  if (token === "auto") return ok(auto());

  const fn = FUNCTION_RE.exec(token);
  if (!fn) return invalidToken(propName, token);

  const name = fn[1];
  const args = splitArguments(fn[2] ?? "");
  if (name === "fit-content") {
    const limit = args.length === 1 ? parseLengthPercentage(args[0] ?? "") : null;
    if (!limit) return invalid(`grid.${propName} "${token}" must be "fit-content(<n> | <n>%)"`);
    return ok(fitContent(limit));
  }
  if (name === "minmax") {
    if (args.length !== 2) {
      return invalid(`grid.${propName} "${token}" must take exactly two arguments`);
    }
    const min = parseMinFunction(args[0] ?? "");
    if (!min) {
      return invalid(
        `grid.${propName} "${token}" minimum must be ` +
          '"auto", "min-content", "max-content", "<n>" or "<n>%"',
      );
    }
    const max = parseMaxFunction(args[1] ?? "");
    if (!max) return invalid(`grid.${propName} "${token}" has an invalid maximum`);
    return ok(minmax(min, max));
  }
  if (name === "repeat") {
    return invalid(`grid.${propName} does not allow repeat() here`);
  }
  return invalidToken(propName, token);
}

function parseRepetition(
  propName: TrackListPropName,
  raw: string,
): LayoutResult<GridTrackRepetition> {
  if (raw === "auto-fill") return ok(AUTO_FILL);
  if (raw === "auto-fit") return ok(AUTO_FIT);
  if (/^\d+$/.test(raw)) {
    const n = Number.parseInt(raw, 10);
    if (n > 0 && n <= MAX_REPETITIONS) return ok(count(n));
  }
  return invalid(
    `grid.${propName} repeat count "${raw}" must be an integer from 1 to ${MAX_REPETITIONS}, ` +
      '"auto-fill" or "auto-fit"',
  );
}

function parseSingleTracks(
  propName: TrackListPropName,
  tokens: readonly string[],
): LayoutResult<readonly NonRepeatedTrackSizingFunction[]> {
  const tracks: NonRepeatedTrackSizingFunction[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) continue;
    const trackRes = parseSingleTrack(propName, token);
    if (!trackRes.ok) return trackRes;
    tracks.push(trackRes.value);
  }
  return ok(tracks);
}

function parseRepeat(
  propName: TrackListPropName,
  token: string,
  body: string,
): LayoutResult<TrackSizingFunction> {
  const args = splitArguments(body);
  if (args.length < 2) {
    return invalid(`grid.${propName} "${token}" must be "repeat(<count>, <tracks>)"`);
  }
  const repetitionRes = parseRepetition(propName, args[0] ?? "");
  if (!repetitionRes.ok) return repetitionRes;

  const tokens = splitTopLevel(args.slice(1).join(" "), false);
  if (tokens === null) return invalid(`grid.${propName} "${token}" has unbalanced parentheses`);
  if (tokens.length === 0) {
    return invalid(`grid.${propName} "${token}" must repeat at least one track`);
  }
  const tracksRes = parseSingleTracks(propName, tokens);
  if (!tracksRes.ok) return tracksRes;
  return ok(repeat(repetitionRes.value, tracksRes.value));
}

function tokenize(propName: TrackListPropName, raw: string): LayoutResult<readonly string[]> {
  const tokens = splitTopLevel(raw.trim().toLowerCase(), true);
  if (tokens === null) return invalid(`grid.${propName} has unbalanced parentheses`);
  if (tokens.length === 0) return invalid(`grid.${propName} must be a non-empty track string`);
  return ok(tokens);
}

/** Parse a `grid-template-*` style track list. */
export function parseTrackList(
  propName: TrackListPropName,
  raw: string,
): LayoutResult<readonly TrackSizingFunction[]> {
  const tokensRes = tokenize(propName, raw);
  if (!tokensRes.ok) return tokensRes;

  const out: TrackSizingFunction[] = [];
  for (const token of tokensRes.value) {
    const fn = FUNCTION_RE.exec(token);
    if (fn && fn[1] === "repeat") {
      const repeatRes = parseRepeat(propName, token, fn[2] ?? "");
      if (!repeatRes.ok) return repeatRes;
      out.push(repeatRes.value);
      continue;
    }
    const trackRes = parseSingleTrack(propName, token);
    if (!trackRes.ok) return trackRes;
    out.push(trackRes.value);
  }
  return ok(Object.freeze(out));
}

/** Parse a `grid-auto-*` style track list; `repeat()` is not allowed. */
export function parseAutoTrackList(
  propName: TrackListPropName,
  raw: string,
): LayoutResult<readonly NonRepeatedTrackSizingFunction[]> {
  const tokensRes = tokenize(propName, raw);
  if (!tokensRes.ok) return tokensRes;
  const tracksRes = parseSingleTracks(propName, tokensRes.value);
  if (!tracksRes.ok) return tracksRes;
  return ok(Object.freeze([...tracksRes.value]));
}
