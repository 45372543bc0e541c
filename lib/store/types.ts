/**
 * Simulation state types and Intent discriminated union.
 */

import type { Grid } from "@/lib/life/grid.js";
import type { Cell } from "@/lib/life/types.js";

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

/** `setup` edits the initial conditions; `running` advances every tick. */
export type Phase = "setup" | "running";

export interface LifeState {
  phase: Phase;
  grid: Grid;
  /** Generations computed since the run started. */
  generation: number;
  /** Cell edited by TOGGLE_CELL during setup. Always inside the surface. */
  cursor: Cell;
  /** Label of the seed currently on the grid, or null for manual edits. */
  seedLabel: string | null;
}

// ---------------------------------------------------------------------------
// Intent types (discriminated union)
// ---------------------------------------------------------------------------

export interface StartIntent {
  type: "START";
}

export interface ResetIntent {
  type: "RESET";
}

export interface TickIntent {
  type: "TICK";
}

export interface ClearIntent {
  type: "CLEAR";
}

export interface MoveCursorIntent {
  type: "MOVE_CURSOR";
  dx: number;
  dy: number;
}

export interface ToggleCellIntent {
  type: "TOGGLE_CELL";
  /** Defaults to the cursor. */
  cell?: Cell;
}

export interface SetGridIntent {
  type: "SET_GRID";
  grid: Grid;
  label: string | null;
}

export type Intent =
  | StartIntent
  | ResetIntent
  | TickIntent
  | ClearIntent
  | MoveCursorIntent
  | ToggleCellIntent
  | SetGridIntent;

// ---------------------------------------------------------------------------
// Store type
// ---------------------------------------------------------------------------

export interface LifeStore extends LifeState {
  dispatch: (intent: Intent) => void;
}
