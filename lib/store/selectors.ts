/**
 * Derived views of the simulation state for the terminal UI.
 */

import type { ViewContext } from "@/lib/keys/types.js";
import type { LifeState, Phase } from "./types.js";

export const WINDOW_TITLE = "Game of Life";

const SETUP_HINT =
  " (set initial conditions [arrows+space|r|g|a|s|l|p|d] and press Enter to start; or Esc to quit)";
const RUNNING_HINT = " (press Enter to re-set the start conditions or Esc to quit)";

export function selectViewContext(phase: Phase): ViewContext {
  return phase === "setup" ? "setup" : "running";
}

/** Title line text, the terminal counterpart of a window caption. */
export function selectTitle(state: Pick<LifeState, "phase" | "generation">): string {
  if (state.phase === "setup") {
    return WINDOW_TITLE + SETUP_HINT;
  }
  return `${WINDOW_TITLE}${RUNNING_HINT} generation=${state.generation}`;
}

export function selectStatus(
  state: Pick<LifeState, "phase" | "grid" | "cursor" | "seedLabel">,
): string {
  const parts = [`population=${state.grid.population}`];
  if (state.seedLabel) parts.push(`seed=${state.seedLabel}`);
  if (state.phase === "setup") {
    parts.push(`cursor=(${state.cursor[0]},${state.cursor[1]})`);
  }
  return parts.join("  ");
}
