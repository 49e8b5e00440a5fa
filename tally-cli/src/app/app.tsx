import React, { useMemo, useState } from "react";
import { Box, useApp, useInput } from "ink";
import type { CalculatorSession } from "tally-main";
import { Header } from "./components/header.js";
import { Transcript } from "./components/transcript.js";
import { StatusBar } from "./components/status-bar.js";
import { ExpressionInput } from "./components/expression-input.js";
import { CompletionList } from "./components/completion-list.js";
import { useSession } from "./hooks/use-session.js";
import {
  acceptCompletion,
  arrowDown,
  arrowUp,
  createEditorState,
  deleteBackward,
  insertText,
  moveCursor,
  recordSubmission,
  type EditorState,
} from "./editor.js";

type Props = {
  readonly session: CalculatorSession;
};

// The scanner only knows ASCII; anything else would become an UNKNOWN token anyway.
function isPrintableAscii(text: string): boolean {
  return /^[\x20-\x7e]+$/.test(text);
}

export function App({ session }: Props): React.JSX.Element {
  const { exit } = useApp();
  const [editor, setEditor] = useState<EditorState>(createEditorState);
  const { transcript, commit, complete, preview } = useSession(session, editor.input);
  const tokens = useMemo(() => session.tokens(editor.input), [session, editor.input]);

  useInput((input, key) => {
    if (key.escape) {
      exit();
      return;
    }

    if (key.tab) {
      setEditor((state) => acceptCompletion(state));
      return;
    }

    if (key.return) {
      if (editor.completion) {
        setEditor((state) => acceptCompletion(state));
        return;
      }
      if (editor.input.trim().length > 0 && commit(editor.input)) {
        setEditor((state) => recordSubmission(state));
      }
      return;
    }

    if (key.upArrow) {
      setEditor((state) => arrowUp(state));
      return;
    }

    if (key.downArrow) {
      setEditor((state) => arrowDown(state));
      return;
    }

    if (key.leftArrow) {
      setEditor((state) => moveCursor(state, -1));
      return;
    }

    if (key.rightArrow) {
      setEditor((state) => moveCursor(state, 1));
      return;
    }

    // Most terminals report the backspace key as delete.
    if (key.backspace || key.delete) {
      setEditor((state) => deleteBackward(state, complete));
      return;
    }

    if (!key.ctrl && !key.meta && isPrintableAscii(input)) {
      setEditor((state) => insertText(state, input, complete));
    }
  });

  return (
    <Box flexDirection="column">
      <Transcript entries={transcript} />
      <Header settings={session.settings} />
      <StatusBar preview={preview} />
      <ExpressionInput value={editor.input} cursor={editor.cursor} tokens={tokens} />
      <CompletionList completion={editor.completion} />
    </Box>
  );
}
