/**
 * Zustand store for simulation state.
 *
 * The reducer already uses Immer's produce() for immutable updates,
 * so the store itself does not need the immer middleware.
 *
 * The surface is only known once configuration has loaded, so the store
 * is built by a factory rather than at import time. The returned hook
 * doubles as the vanilla store (`getState`, `subscribe`) for timers and
 * other non-React code.
 */

import { create } from "zustand";

import { createEmpty } from "@/lib/life/grid.js";
import { centreCell } from "@/lib/life/surface.js";
import type { Surface } from "@/lib/life/types.js";
import { reduce } from "./reducer.js";
import type { Intent, LifeState, LifeStore } from "./types.js";

export function createInitialState(surface: Surface): LifeState {
  return {
    phase: "setup",
    grid: createEmpty(surface),
    generation: 0,
    cursor: centreCell(surface),
    seedLabel: null,
  };
}

export function createLifeStore(surface: Surface) {
  return create<LifeStore>()((set, get) => ({
    ...createInitialState(surface),

    dispatch: (intent: Intent) => {
      const { dispatch: _, ...currentState } = get();
      const nextState = reduce(currentState, intent);
      set(nextState);
    },
  }));
}

export type LifeStoreHook = ReturnType<typeof createLifeStore>;

export { reduce } from "./reducer.js";
export { selectStatus, selectTitle, selectViewContext, WINDOW_TITLE } from "./selectors.js";
export type { Intent, LifeState, LifeStore, Phase } from "./types.js";
