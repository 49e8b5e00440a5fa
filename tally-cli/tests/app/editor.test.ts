import { describe, expect, it } from "vitest";
import {
  acceptCompletion,
  arrowDown,
  arrowUp,
  createEditorState,
  deleteBackward,
  insertText,
  moveCursor,
  recordSubmission,
  type Completer,
  type EditorState,
} from "../../src/app/editor.js";

const NAMES = ["sin", "sqrt", "sum", "x"];
const complete: Completer = (prefix) => NAMES.filter((name) => name.startsWith(prefix));
const none: Completer = () => [];

function typed(text: string, completer: Completer = none): EditorState {
  return insertText(createEditorState(), text, completer);
}

describe("editor", () => {
  it("inserts at the cursor", () => {
    let state = typed("13");
    state = moveCursor(state, -1);
    state = insertText(state, "2", none);
    expect(state.input).toBe("123");
    expect(state.cursor).toBe(2);
  });

  it("keeps the cursor inside the line", () => {
    const state = typed("ab");
    expect(moveCursor(state, 5).cursor).toBe(2);
    expect(moveCursor(state, -5).cursor).toBe(0);
  });

  it("deletes the character before the cursor", () => {
    let state = typed("12+");
    state = deleteBackward(state, none);
    expect(state.input).toBe("12");
    expect(state.cursor).toBe(2);
    expect(deleteBackward(moveCursor(state, -2), none).input).toBe("12");
  });

  describe("completion", () => {
    it("opens a list for the identifier before the cursor", () => {
      const state = typed("1+s", complete);
      expect(state.completion).toEqual({ items: ["sin", "sqrt", "sum"], index: 0 });
    });

    it("closes the list when nothing matches", () => {
      expect(typed("1+q", complete).completion).toBeNull();
      expect(typed("1+", complete).completion).toBeNull();
    });

    it("refreshes after backspace", () => {
      let state = typed("sq", complete);
      expect(state.completion?.items).toEqual(["sqrt"]);
      state = deleteBackward(state, complete);
      expect(state.completion?.items).toEqual(["sin", "sqrt", "sum"]);
    });

    it("moves the selection within bounds", () => {
      let state = typed("s", complete);
      state = arrowDown(arrowDown(arrowDown(state)));
      expect(state.completion?.index).toBe(2);
      state = arrowUp(arrowUp(arrowUp(state)));
      expect(state.completion?.index).toBe(0);
    });

    it("replaces the identifier with the selection", () => {
      let state = typed("2*s", complete);
      state = arrowDown(state);
      state = acceptCompletion(state);
      expect(state.input).toBe("2*sqrt");
      expect(state.cursor).toBe(6);
      expect(state.completion).toBeNull();
    });

    it("replaces only up to the cursor", () => {
      let state = typed("su+1", none);
      state = moveCursor(state, -2);
      state = insertText(state, "m", complete);
      expect(state.input).toBe("sum+1");
      state = acceptCompletion(state);
      expect(state.input).toBe("sum+1");
      expect(state.cursor).toBe(3);
    });
  });

  describe("history", () => {
    it("records submissions and clears the line", () => {
      const state = recordSubmission(typed("1+1"));
      expect(state).toEqual({
        input: "",
        cursor: 0,
        history: ["1+1"],
        historyIndex: 1,
        completion: null,
      });
    });

    it("walks back and forward through history", () => {
      let state = recordSubmission(typed("1"));
      state = recordSubmission(insertText(state, "22", none));

      state = arrowUp(state);
      expect(state.input).toBe("22");
      expect(state.cursor).toBe(2);
      state = arrowUp(state);
      expect(state.input).toBe("1");
      expect(arrowUp(state)).toBe(state);

      state = arrowDown(state);
      expect(state.input).toBe("22");
      state = arrowDown(state);
      expect(state.input).toBe("");
      expect(arrowDown(state)).toBe(state);
    });
  });
});
