// Line predicates for C-style comment syntax. Matching is purely lexical: a `//` or `/*` inside
// a string literal is not told apart from a real comment.

export type LineKind =
  | "code"
  | "singleLineComment"
  | "multiLineCommentStart"
  | "multiLineCommentContinuation"
  | "multiLineCommentEnd";

const kSingleLineOpen = /^\s*\/\//;
const kMultiLineOpen = /^\s*\/\*/;
const kMultiLineClose = "*/";

export function isSingleLineComment(line: string): boolean {
  return kSingleLineOpen.test(line);
}

export function startsMultiLineComment(line: string): boolean {
  return kMultiLineOpen.test(line);
}

// A `//` line never closes a block comment, even when it contains `*/`.
export function endsMultiLineComment(line: string): boolean {
  if (isSingleLineComment(line)) {
    return false;
  }
  return line.includes(kMultiLineClose);
}

// Describes a single line given whether a block comment was already open before it.
// A block comment that opens and closes on the same line reports as its start.
export function classifyLine(line: string, insideMultiLine: boolean): LineKind {
  if (isSingleLineComment(line)) {
    return "singleLineComment";
  }
  if (startsMultiLineComment(line)) {
    return "multiLineCommentStart";
  }
  if (insideMultiLine) {
    return endsMultiLineComment(line) ? "multiLineCommentEnd" : "multiLineCommentContinuation";
  }
  return "code";
}
