/**
 * Pure reducer for simulation intents.
 *
 * Uses Immer's produce() so handlers can write mutating syntax while
 * producing immutable snapshots. Grid values are opaque to Immer: they are
 * replaced, never drafted, and always computed from the previous state.
 */

import { produce } from "immer";

import { createEmpty, toggle } from "@/lib/life/grid.js";
import { advance } from "@/lib/life/rules.js";
import type { Intent, LifeState } from "./types.js";

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function reduce(state: LifeState, intent: Intent): LifeState {
  return produce(state, (draft) => {
    switch (intent.type) {
      case "START": {
        if (state.phase !== "setup") return;
        draft.phase = "running";
        draft.generation = 0;
        return;
      }

      case "RESET": {
        draft.phase = "setup";
        draft.grid = createEmpty(state.grid.surface);
        draft.generation = 0;
        draft.seedLabel = null;
        return;
      }

      case "TICK": {
        if (state.phase !== "running") return;
        draft.grid = advance(state.grid);
        draft.generation = state.generation + 1;
        return;
      }

      case "CLEAR": {
        if (state.phase !== "setup") return;
        draft.grid = createEmpty(state.grid.surface);
        draft.seedLabel = null;
        return;
      }

      case "MOVE_CURSOR": {
        const { width, height } = state.grid.surface;
        const [x, y] = state.cursor;
        draft.cursor = [
          clamp(x + intent.dx, 0, width - 1),
          clamp(y + intent.dy, 0, height - 1),
        ];
        return;
      }

      // An explicit cell outside the surface throws OutOfBoundsError.
      case "TOGGLE_CELL": {
        if (state.phase !== "setup") return;
        draft.grid = toggle(state.grid, intent.cell ?? state.cursor);
        draft.seedLabel = null;
        return;
      }

      case "SET_GRID": {
        if (state.phase !== "setup") return;
        const current = state.grid.surface;
        const next = intent.grid.surface;
        if (current.width !== next.width || current.height !== next.height) {
          throw new RangeError(
            `Grid surface ${next.width}x${next.height} does not match ${current.width}x${current.height}`,
          );
        }
        draft.grid = intent.grid;
        draft.seedLabel = intent.label;
        return;
      }
    }
  });
}
