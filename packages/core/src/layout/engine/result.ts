/** Fatal error type for invalid grid props. */
export type InvalidPropsFatal = Readonly<{ code: "GRID_INVALID_PROPS"; detail: string }>;

/**
 * Layout operation result: success with value, or failure with fatal error.
 * Used wherever user-facing grid input is validated.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: InvalidPropsFatal }>;

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function invalid(detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code: "GRID_INVALID_PROPS", detail } };
}
