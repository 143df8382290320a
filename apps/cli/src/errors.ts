/**
 * One-line rendering of failures for the terminal.
 */

/** `Tag: message` for tagged errors, `Fatal: ...` for anything else. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    if ("_tag" in err && typeof err._tag === "string") {
      return `${err._tag}: ${err.message}`;
    }
    return `Fatal: ${err.message}`;
  }
  return `Fatal: ${String(err)}`;
}
