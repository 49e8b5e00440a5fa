import React from "react";
import { Box, Text } from "ink";
import type { CompletionState } from "../editor.js";

const MAX_VISIBLE = 6;

type Props = {
  readonly completion: CompletionState | null;
};

export function CompletionList({ completion }: Props): React.JSX.Element | null {
  if (!completion) return null;

  // Keep the selection inside the visible window.
  const first = Math.max(0, completion.index - MAX_VISIBLE + 1);
  const visible = completion.items.slice(first, first + MAX_VISIBLE);

  return (
    <Box flexDirection="column" paddingX={2} width={34}>
      {visible.map((name, offset) => {
        const selected = first + offset === completion.index;
        return (
          <Text key={name} backgroundColor={selected ? "gray" : undefined}>
            {name}
          </Text>
        );
      })}
    </Box>
  );
}
