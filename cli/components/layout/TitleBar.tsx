/**
 * Title line at the top of the terminal, the counterpart of a window
 * caption: program name, phase hint and generation counter.
 */

import React from "react";
import { Box, Text } from "ink";

import { titleColor } from "@/lib/theme/ink-colors.js";

interface TitleBarProps {
  title: string;
}

export function TitleBar({ title }: TitleBarProps) {
  const colorFn = titleColor();

  return (
    <Box flexDirection="column">
      <Text bold>{colorFn(title)}</Text>
      <Text dimColor>{"─".repeat(Math.min(title.length, 80))}</Text>
    </Box>
  );
}
