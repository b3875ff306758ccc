/**
 * packages/core/src/errors.ts — Error codes and the error class for Trellis.
 *
 * Why: Build-time failures travel as `{ code, detail }` data on faulted nodes so
 * a broken subtree never aborts a flush. The same codes are thrown as
 * TrellisError at API boundaries (config, state paths, disposed sessions).
 */

/**
 * Deterministic error codes for all runtime violations.
 */
export type TrellisErrorCode =
  | "TRUI_MALFORMED_DESCRIPTOR"
  | "TRUI_UNKNOWN_COMPONENT_KIND"
  | "TRUI_REMOTE_FETCH_ERROR"
  | "TRUI_RENDER_THROW"
  | "TRUI_INVALID_CONFIG"
  | "TRUI_INVALID_STATE_PATH"
  | "TRUI_DISPOSED";

/** Codes a node build can fault with. */
export type BuildFaultCode = Extract<
  TrellisErrorCode,
  "TRUI_MALFORMED_DESCRIPTOR" | "TRUI_UNKNOWN_COMPONENT_KIND" | "TRUI_RENDER_THROW"
>;

/** Fatal error from building a node. */
export type BuildFatal = Readonly<{
  code: BuildFaultCode;
  detail: string;
}>;

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class TrellisError extends Error {
  override readonly name = "TrellisError";
  readonly code: TrellisErrorCode;

  constructor(code: TrellisErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrellisError);
    }
  }
}

export function isBuildFaultCode(code: TrellisErrorCode): code is BuildFaultCode {
  return (
    code === "TRUI_MALFORMED_DESCRIPTOR" ||
    code === "TRUI_UNKNOWN_COMPONENT_KIND" ||
    code === "TRUI_RENDER_THROW"
  );
}

/** Render a thrown value for a detail string. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unprintable]";
  }
}

const MAX_PREVIEW_CHARS = 80;

/** Short, deterministic preview of an offending value for error details. */
export function previewValue(v: unknown): string {
  if (typeof v === "function") return `[function ${v.name || "anonymous"}]`;
  if (typeof v === "symbol") return v.toString();
  if (typeof v === "bigint") return `${v.toString()}n`;
  let text: string | undefined;
  try {
    text = JSON.stringify(v);
  } catch {
    text = undefined;
  }
  if (text === undefined) text = Array.isArray(v) ? "[array]" : String(v);
  return text.length > MAX_PREVIEW_CHARS ? `${text.slice(0, MAX_PREVIEW_CHARS - 3)}...` : text;
}
