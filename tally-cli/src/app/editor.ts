import { identifierRange } from "tally-main";

export type CompletionState = {
  readonly items: readonly string[];
  readonly index: number;
};

export type EditorState = {
  readonly input: string;
  readonly cursor: number;
  readonly history: readonly string[];
  /** Equals `history.length` while editing a fresh line. */
  readonly historyIndex: number;
  readonly completion: CompletionState | null;
};

export type Completer = (prefix: string) => readonly string[];

export function createEditorState(): EditorState {
  return { input: "", cursor: 0, history: [], historyIndex: 0, completion: null };
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function withCompletions(state: EditorState, complete: Completer): EditorState {
  const range = identifierRange(state.input, state.cursor);
  const items = range ? complete(state.input.slice(range.start, range.end)) : [];
  return { ...state, completion: items.length > 0 ? { items, index: 0 } : null };
}

export function insertText(state: EditorState, text: string, complete: Completer): EditorState {
  const input = state.input.slice(0, state.cursor) + text + state.input.slice(state.cursor);
  return withCompletions({ ...state, input, cursor: state.cursor + text.length }, complete);
}

export function deleteBackward(state: EditorState, complete: Completer): EditorState {
  if (state.cursor === 0) return state;
  const input = state.input.slice(0, state.cursor - 1) + state.input.slice(state.cursor);
  return withCompletions({ ...state, input, cursor: state.cursor - 1 }, complete);
}

export function moveCursor(state: EditorState, delta: number): EditorState {
  return { ...state, cursor: clamp(state.cursor + delta, 0, state.input.length) };
}

/** Up arrow: moves the completion selection if a list is open, else recalls older history. */
export function arrowUp(state: EditorState): EditorState {
  if (state.completion) {
    const index = Math.max(0, state.completion.index - 1);
    return { ...state, completion: { ...state.completion, index } };
  }
  if (state.historyIndex === 0) return state;
  const historyIndex = state.historyIndex - 1;
  const input = state.history[historyIndex] ?? "";
  return { ...state, historyIndex, input, cursor: input.length };
}

export function arrowDown(state: EditorState): EditorState {
  if (state.completion) {
    const index = Math.min(state.completion.items.length - 1, state.completion.index + 1);
    return { ...state, completion: { ...state.completion, index } };
  }
  if (state.historyIndex >= state.history.length) return state;
  const historyIndex = state.historyIndex + 1;
  const input = state.history[historyIndex] ?? "";
  return { ...state, historyIndex, input, cursor: input.length };
}

/** Replaces the identifier before the cursor with the selected completion and closes the list. */
export function acceptCompletion(state: EditorState): EditorState {
  const choice = state.completion?.items[state.completion.index];
  const range = identifierRange(state.input, state.cursor);
  if (choice === undefined || !range) return { ...state, completion: null };

  const input = state.input.slice(0, range.start) + choice + state.input.slice(range.end);
  return { ...state, input, cursor: range.start + choice.length, completion: null };
}

/** Clears the line after a successful commit and appends it to history. */
export function recordSubmission(state: EditorState): EditorState {
  const history = [...state.history, state.input];
  return { input: "", cursor: 0, history, historyIndex: history.length, completion: null };
}
