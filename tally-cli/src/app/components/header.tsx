import React from "react";
import { Box, Text } from "ink";
import type { Settings } from "tally-main";

type Props = {
  readonly settings: Settings;
};

export function settingsSummary(settings: Settings): string {
  return `${settings.displayDigits} digits, call depth ${settings.maxCallDepth}`;
}

export function Header({ settings }: Props): React.JSX.Element {
  return (
    <Box borderStyle="round" borderColor="green" paddingX={1} justifyContent="space-between">
      <Text bold color="green">
        Tally
      </Text>
      <Text dimColor>{settingsSummary(settings)}</Text>
    </Box>
  );
}
