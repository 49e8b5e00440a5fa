import { useCallback, useMemo, useRef, useState } from "react";
import type { CalculatorSession } from "tally-main";
import type { PreviewLine, TranscriptEntry } from "../types.js";

type UseSessionReturn = {
  transcript: TranscriptEntry[];
  /** Commits `input`; returns false and records nothing when it fails. */
  commit: (input: string) => boolean;
  complete: (prefix: string) => string[];
  preview: PreviewLine;
};

let nextId = 1;

export function useSession(session: CalculatorSession, input: string): UseSessionReturn {
  const [transcript, setTranscript] = useState<TranscriptEntry[]>([]);
  const sessionRef = useRef(session);
  sessionRef.current = session;

  const commit = useCallback((line: string): boolean => {
    const result = sessionRef.current.commit(line);
    if (!result.ok) return false;

    const entry: TranscriptEntry = {
      id: String(nextId++),
      input: line,
      tokens: sessionRef.current.tokens(line),
      output: result.output,
    };
    setTranscript((prev) => [...prev, entry]);
    return true;
  }, []);

  const complete = useCallback(
    (prefix: string) => sessionRef.current.complete(prefix).map((c) => c.name),
    [],
  );

  // Re-run after every commit as well: a definition can change the result.
  const preview = useMemo((): PreviewLine => {
    if (input.trim().length === 0) return { kind: "empty" };
    const result = sessionRef.current.preview(input);
    return result.ok
      ? { kind: "result", output: result.output }
      : { kind: "error", message: result.error };
  }, [input, transcript]);

  return { transcript, commit, complete, preview };
}
