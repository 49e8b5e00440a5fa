import type { Token } from "tally-main";

export type TranscriptEntry = {
  id: string;
  input: string;
  tokens: Token[];
  output: string;
};

export type PreviewLine =
  | { kind: "empty" }
  | { kind: "result"; output: string }
  | { kind: "error"; message: string };
