import React from "react";
import { Box, Static, Text } from "ink";
import type { TranscriptEntry } from "../types.js";
import { ExpressionLine } from "./expression-line.js";

type Props = {
  readonly entries: TranscriptEntry[];
};

export function Transcript({ entries }: Props): React.JSX.Element {
  return (
    <Static items={entries}>
      {(entry) => (
        <Box key={entry.id} flexDirection="column" marginTop={1}>
          <ExpressionLine input={entry.input} tokens={entry.tokens} />
          <Text>
            = <Text color="red">{entry.output}</Text>
          </Text>
        </Box>
      )}
    </Static>
  );
}
