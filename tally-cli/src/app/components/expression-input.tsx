import React from "react";
import { Box, Text } from "ink";
import type { Token } from "tally-main";
import { ExpressionLine } from "./expression-line.js";

type Props = {
  readonly value: string;
  readonly cursor: number;
  readonly tokens: readonly Token[];
};

export function ExpressionInput({ value, cursor, tokens }: Props): React.JSX.Element {
  return (
    <Box borderStyle="single" borderColor="gray" paddingX={1}>
      <Text color="green" bold>
        {">"}{" "}
      </Text>
      <ExpressionLine input={value} tokens={tokens} cursor={cursor} />
    </Box>
  );
}
