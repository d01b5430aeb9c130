export interface NormalizeOptions {
  preserveWhitespace?: boolean;
}

// Leading `*` continuation markers, as in the body of a doc comment. `\s` also spans line breaks,
// so a blank line directly before a starred line goes away with the marker.
const kContinuationMarker = /^\s*\*+/gm;

function leadingWhitespaceLength(line: string): number {
  const match = /^\s*/.exec(line);
  return match ? match[0].length : 0;
}

// Strips continuation markers and the indentation of the first line from every line that has at
// least that much, then trims the block.
//
// The reference width comes from the first line only. Lines indented less than the first line keep
// their indentation; this is a heuristic, not a minimal-common-indent computation.
export function normalizeBlock(text: string, options: NormalizeOptions = {}): string {
  if (options.preserveWhitespace) {
    return text;
  }

  const lines = text.replace(kContinuationMarker, "").split("\n");
  const indentSize = leadingWhitespaceLength(lines[0]);
  const unindented = lines.map((line) => {
    if (line === "") {
      return "";
    }
    if (indentSize > 0 && leadingWhitespaceLength(line) >= indentSize) {
      return line.slice(indentSize);
    }
    return line;
  });

  return unindented.join("\n").trim();
}
