/**
 * Status bar / footer rendered at the bottom of the terminal.
 *
 * Shows:
 * - Population, seed and cursor status
 * - Key hints for the active phase
 */

import React from "react";
import { Box, Text } from "ink";

import { getFooterHints } from "@/lib/keys/bindings.js";
import type { ViewContext } from "@/lib/keys/types.js";
import { statusBarFg } from "@/lib/theme/ink-colors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface FooterProps {
  viewContext: ViewContext;
  status: string;
}

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export function Footer({ viewContext, status }: FooterProps) {
  const hints = getFooterHints(viewContext);
  const fgFn = statusBarFg();

  return (
    <Box flexDirection="column">
      {/* Separator */}
      <Text dimColor>{"─".repeat(80)}</Text>

      {/* Status line */}
      <Text>{fgFn(status)}</Text>

      {/* Key hints */}
      <Box flexDirection="row" flexWrap="wrap" columnGap={1}>
        {hints.map((hint, i) => (
          <Text key={i}>
            {fgFn(`[${hint.key}]`)} <Text dimColor>{hint.description}</Text>
          </Text>
        ))}
      </Box>
    </Box>
  );
}
