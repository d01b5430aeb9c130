// Removes comment delimiters from a single line. Both functions accept anything and never throw;
// a missing line strips to "".

function coerceLine(line: string | null | undefined): string {
  return typeof line === "string" ? line : "";
}

// Drops the first `//` (and the whitespace before it) and any trailing whitespace, including the
// line terminator.
export function stripSingleLineMarker(line: string | null | undefined): string {
  return coerceLine(line).replace(/\s*\/\//, "").trimEnd();
}

// Drops the first `/*` (with its leading whitespace) and the first `*/`, independently of each
// other.
export function stripMultiLineMarkers(line: string | null | undefined): string {
  return coerceLine(line).replace(/\s*\/\*/, "").replace("*/", "").trimEnd();
}
