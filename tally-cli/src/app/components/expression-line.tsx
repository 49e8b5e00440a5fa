import React from "react";
import { Text } from "ink";
import type { Token } from "tally-main";
import { styleRuns } from "../highlight.js";

type Props = {
  readonly input: string;
  readonly tokens: readonly Token[];
  readonly cursor?: number;
};

export function ExpressionLine({ input, tokens, cursor }: Props): React.JSX.Element {
  const runs = styleRuns(input, tokens, cursor);
  return (
    <Text>
      {runs.map((run, index) => (
        <Text key={index} color={run.color} inverse={run.inverse}>
          {run.text}
        </Text>
      ))}
    </Text>
  );
}
