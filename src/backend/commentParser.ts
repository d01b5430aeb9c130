import { accumulateBlocks } from "./blockAccumulator";
import { normalizeBlock } from "./blockNormalizer";
import { CommentInput, describeInput, iterateLines, readInputText } from "./inputSource";

export interface CommentParserOptions {
  // Keep comment text exactly as accumulated: no indentation or `*` stripping.
  preserveWhitespace?: boolean;
}

// Extracts normalized comment blocks, in source order, from a sequence of lines.
export function parseCommentBlocks(lines: Iterable<string>, options: CommentParserOptions = {}): string[] {
  const normalizeOptions = { preserveWhitespace: options.preserveWhitespace ?? false };
  const blocks: string[] = [];
  for (const rawBlock of accumulateBlocks(lines)) {
    blocks.push(normalizeBlock(rawBlock, normalizeOptions));
  }
  return blocks;
}

export function parseCommentText(text: string, options: CommentParserOptions = {}): string[] {
  return parseCommentBlocks(iterateLines(text), options);
}

// Parses one input on first access and hands out the same result afterwards.
export class CommentParser {
  readonly input: CommentInput;
  readonly options: Readonly<Required<CommentParserOptions>>;
  private parsedBlocks: readonly string[] | undefined;

  constructor(input: CommentInput, options: CommentParserOptions = {}) {
    this.input = input;
    this.options = { preserveWhitespace: options.preserveWhitespace ?? false };
  }

  get sourceName(): string {
    return describeInput(this.input);
  }

  get isParsed(): boolean {
    return this.parsedBlocks !== undefined;
  }

  // Throws InputReadError on the first access if a file input cannot be read.
  get blocks(): readonly string[] {
    return this.parsedBlocks ?? this.parse();
  }

  parse(): readonly string[] {
    const text = readInputText(this.input);
    const blocks = Object.freeze(parseCommentText(text, this.options));
    this.parsedBlocks = blocks;
    return blocks;
  }
}
