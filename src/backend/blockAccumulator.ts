import { endsMultiLineComment, isSingleLineComment, startsMultiLineComment } from "./commentClassifier";
import { stripMultiLineMarkers, stripSingleLineMarker } from "./commentStripper";

// Folds a stream of source lines into raw comment blocks: a run of consecutive `//` lines, or one
// `/* ... */` span. State is a plain value; every step returns a new one.

const kLineSeparator = "\n";

export interface AccumulatorState {
  // undefined when no block is open
  readonly currentBlockText: string | undefined;
  readonly insideSingleLineRun: boolean;
  readonly insideMultiLineRun: boolean;
}

export type AccumulatorMode = "idle" | "singleLine" | "multiLine";

export interface AccumulatorStep {
  state: AccumulatorState;
  // raw (not yet normalized) text of a block completed by this step
  flushed?: string;
}

export function initialAccumulatorState(): AccumulatorState {
  return {
    currentBlockText: undefined,
    insideSingleLineRun: false,
    insideMultiLineRun: false,
  };
}

// Both flags can be set at once when a `//` line appears inside a block comment; the block comment
// wins.
export function accumulatorMode(state: AccumulatorState): AccumulatorMode {
  if (state.insideMultiLineRun) {
    return "multiLine";
  }
  return state.insideSingleLineRun ? "singleLine" : "idle";
}

function appendLine(blockText: string | undefined, text: string): string {
  return blockText === undefined ? text : blockText + kLineSeparator + text;
}

export function consumeLine(state: AccumulatorState, line: string): AccumulatorStep {
  let { currentBlockText, insideSingleLineRun, insideMultiLineRun } = state;
  const singleLine = isSingleLineComment(line);

  if (singleLine) {
    const stripped = stripSingleLineMarker(line);
    if (insideSingleLineRun) {
      currentBlockText = appendLine(currentBlockText, stripped);
    } else {
      currentBlockText = stripped;
      insideSingleLineRun = true;
    }
  }

  // Not an else: a line can take part in both runs, and opening a block comment replaces whatever
  // text was open.
  if (insideMultiLineRun || startsMultiLineComment(line)) {
    const stripped = stripMultiLineMarkers(line);
    if (insideMultiLineRun) {
      currentBlockText = appendLine(currentBlockText, stripped);
    } else {
      currentBlockText = stripped;
      insideMultiLineRun = true;
    }
  }

  if (endsMultiLineComment(line)) {
    insideMultiLineRun = false;
  }

  if (singleLine || insideMultiLineRun) {
    return { state: { currentBlockText, insideSingleLineRun, insideMultiLineRun } };
  }

  return {
    state: { currentBlockText: undefined, insideSingleLineRun: false, insideMultiLineRun: false },
    flushed: currentBlockText,
  };
}

// End of input acts like a trailing code line, except that an unterminated block comment is
// flushed as well.
export function finishInput(state: AccumulatorState): AccumulatorStep {
  return {
    state: initialAccumulatorState(),
    flushed: state.currentBlockText,
  };
}

export function* accumulateBlocks(lines: Iterable<string>): Generator<string> {
  let state = initialAccumulatorState();
  for (const line of lines) {
    const step = consumeLine(state, line);
    state = step.state;
    if (step.flushed !== undefined) {
      yield step.flushed;
    }
  }

  const last = finishInput(state);
  if (last.flushed !== undefined) {
    yield last.flushed;
  }
}
