// Library entry point.

export {
  classifyLine,
  endsMultiLineComment,
  isSingleLineComment,
  startsMultiLineComment,
} from "./backend/commentClassifier";
export type { LineKind } from "./backend/commentClassifier";
export { stripMultiLineMarkers, stripSingleLineMarker } from "./backend/commentStripper";
export {
  accumulateBlocks,
  accumulatorMode,
  consumeLine,
  finishInput,
  initialAccumulatorState,
} from "./backend/blockAccumulator";
export type { AccumulatorMode, AccumulatorState, AccumulatorStep } from "./backend/blockAccumulator";
export { normalizeBlock } from "./backend/blockNormalizer";
export type { NormalizeOptions } from "./backend/blockNormalizer";
export { CommentParser, parseCommentBlocks, parseCommentText } from "./backend/commentParser";
export type { CommentParserOptions } from "./backend/commentParser";
export { describeInput, fileInput, InputReadError, iterateLines, readInputText, textInput } from "./backend/inputSource";
export type { CommentInput, FileInput, TextInput } from "./backend/inputSource";
