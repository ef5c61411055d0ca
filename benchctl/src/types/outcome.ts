/**
 * Result of a best-effort step. Hard failures are thrown as `BenchError`s;
 * a recoverable absence is reported as `skipped` so callers can branch on it
 * without parsing log output.
 */
export type SkipCode = "EXTERNAL_TOOL_MISSING" | "NO_SUITABLE_ARTIFACT" | "NO_BUILD_DESCRIPTOR";

export type Outcome<T> =
  | ({ status: "ok" } & T)
  | { status: "skipped"; code: SkipCode; reason: string };
