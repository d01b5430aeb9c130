import * as path from "path";
import { readTextFileSync } from "../utils/fileSystem";

// Where comment text comes from. Callers say which one they mean; a string is never probed
// against the file system to guess.
export type FileInput = { kind: "file"; path: string };
export type TextInput = { kind: "text"; text: string; label?: string };
export type CommentInput = FileInput | TextInput;

export class InputReadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "InputReadError";
  }
}

export function fileInput(filePath: string): FileInput {
  return { kind: "file", path: path.resolve(filePath) };
}

export function textInput(text: string, label?: string): TextInput {
  return { kind: "text", text, label };
}

// Human readable name used in output and log messages.
export function describeInput(input: CommentInput): string {
  switch (input.kind) {
    case "file":
      return input.path;
    case "text":
      return input.label ?? "<text>";
  }
}

export function readInputText(input: CommentInput): string {
  if (input.kind === "text") {
    return input.text;
  }
  try {
    return readTextFileSync(input.path, "utf-8");
  } catch (error) {
    throw new InputReadError(`Failed to read input file: ${input.path}`, error instanceof Error ? error : undefined);
  }
}

// Yields each line with its terminator still attached; CRLF stays together since the split is on
// "\n". Empty text yields nothing, and a final line without a terminator is still yielded.
export function* iterateLines(text: string): Generator<string> {
  let start = 0;
  while (start < text.length) {
    const newline = text.indexOf("\n", start);
    if (newline === -1) {
      yield text.slice(start);
      return;
    }
    yield text.slice(start, newline + 1);
    start = newline + 1;
  }
}
