import React from "react";
import { Box, Text } from "ink";
import type { PreviewLine } from "../types.js";

type Props = {
  readonly preview: PreviewLine;
};

export function StatusBar({ preview }: Props): React.JSX.Element {
  return (
    <Box paddingX={1} height={1}>
      {preview.kind === "result" ? (
        <Text>
          Current result <Text color="red">{preview.output}</Text>
        </Text>
      ) : preview.kind === "error" ? (
        <Text color="yellow">{preview.message}</Text>
      ) : (
        <Text dimColor>
          Enter: evaluate | Tab: complete | Up/Down: history | Esc: exit
        </Text>
      )}
    </Box>
  );
}
