/**
 * Braille-character renderer for the simulation grid.
 *
 * Each terminal character shows a 2x4 block of cells. Live cells are drawn
 * in the live-cell color; during setup the character holding the cursor
 * is drawn inverted so the edited cell can be found.
 */

import React, { useMemo } from "react";
import { Box, Text } from "ink";

import type { Grid } from "@/lib/life/grid.js";
import type { Cell } from "@/lib/life/types.js";
import { renderBraille } from "@/lib/render/braille.js";
import { cursorColor, liveCellColor } from "@/lib/theme/ink-colors.js";

export interface LifeCanvasProps {
  grid: Grid;
  /** Cursor to highlight, or null while running. */
  cursor: Cell | null;
}

export function LifeCanvas({ grid, cursor }: LifeCanvasProps): React.ReactElement {
  const frame = useMemo(() => renderBraille(grid, cursor), [grid, cursor]);

  const live = liveCellColor();
  const highlight = cursorColor();

  return (
    <Box flexDirection="column">
      {frame.lines.map((line, row) => {
        if (frame.cursor === null || frame.cursor.row !== row) {
          return <Text key={row}>{live(line)}</Text>;
        }
        const col = frame.cursor.column;
        return (
          <Text key={row}>
            {live(line.slice(0, col))}
            {highlight(line.slice(col, col + 1))}
            {live(line.slice(col + 1))}
          </Text>
        );
      })}
    </Box>
  );
}
