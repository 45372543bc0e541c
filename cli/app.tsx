/**
 * Root application component for the Game of Life terminal UI.
 *
 * Orchestrates the vertical layout (TitleBar, LifeCanvas, Notification,
 * Footer), wires key bindings to store intents and runs the tick loop.
 *
 * Data flow:
 *   Keys -> Store (via useKeyBindings action dispatch)
 *   Ticker -> Store (TICK intents while running)
 *   Store -> Views (via selectors)
 */

import React, { useState, useCallback, useMemo } from "react";
import { Box, useApp } from "ink";

import type { LifeConfig } from "@/lib/config/config.js";
import { seededRandom } from "@/lib/life/grid.js";
import { LOAD_PATTERN_PREFIX } from "@/lib/keys/bindings.js";
import { PATTERNS } from "@/lib/patterns/registry.js";
import {
  selectStatus,
  selectTitle,
  selectViewContext,
  type LifeStoreHook,
} from "@/lib/store/index.js";

import { useKeyBindings } from "./hooks/useKeyBindings.js";
import { useSimulationLoop } from "./hooks/useSimulationLoop.js";

import { LifeCanvas } from "./components/canvas/LifeCanvas.js";
import { Footer, Notification, TitleBar } from "./components/layout/index.js";

import { nextNotice, type Notice, type NotificationType } from "./lib/notifications.js";

import { seedFromPattern, seedRandom, type SeedResult } from "./lib/seeding.js";

// ---------------------------------------------------------------------------
// Root App
// ---------------------------------------------------------------------------

interface AppProps {
  config: LifeConfig;
  store: LifeStoreHook;
}

export function App({ config, store }: AppProps) {
  const app = useApp();
  const dispatch = store((s) => s.dispatch);
  const phase = store((s) => s.phase);
  const grid = store((s) => s.grid);
  const generation = store((s) => s.generation);
  const cursor = store((s) => s.cursor);
  const seedLabel = store((s) => s.seedLabel);

  // -- Random source (one per mount, so a configured seed replays) ---------

  const random = useMemo(
    () => (config.seed === null ? Math.random : seededRandom(config.seed)),
    [config.seed],
  );

  // -- Notification state ---------------------------------------------------

  const [notification, setNotification] = useState<Notice | null>(null);

  const showNotification = useCallback(
    (message: string, type: NotificationType = "info") => {
      setNotification((previous) => nextNotice(previous, message, type));
    },
    [],
  );

  const dismissNotification = useCallback(() => {
    setNotification(null);
  }, []);

  const applySeed = useCallback(
    (result: SeedResult) => {
      if (!result.ok) {
        showNotification(result.message, "error");
        return;
      }
      dispatch({ type: "SET_GRID", grid: result.grid, label: result.label });
      showNotification(result.message, "success");
    },
    [dispatch, showNotification],
  );

  // -- Tick loop ------------------------------------------------------------

  useSimulationLoop(store, config.fps);

  // -- Key bindings ---------------------------------------------------------

  const viewContext = selectViewContext(phase);

  const handlers = useMemo(() => {
    const map: Record<string, () => void> = {
      quit: () => app.exit(),
      start: () => dispatch({ type: "START" }),
      reset: () => dispatch({ type: "RESET" }),
      clear: () => dispatch({ type: "CLEAR" }),
      toggle_cell: () => dispatch({ type: "TOGGLE_CELL" }),
      cursor_up: () => dispatch({ type: "MOVE_CURSOR", dx: 0, dy: -1 }),
      cursor_down: () => dispatch({ type: "MOVE_CURSOR", dx: 0, dy: 1 }),
      cursor_left: () => dispatch({ type: "MOVE_CURSOR", dx: -1, dy: 0 }),
      cursor_right: () => dispatch({ type: "MOVE_CURSOR", dx: 1, dy: 0 }),
      seed_random: () => applySeed(seedRandom(config, random)),
    };
    for (const entry of PATTERNS) {
      map[`${LOAD_PATTERN_PREFIX}${entry.id}`] = () => applySeed(seedFromPattern(entry, config));
    }
    return map;
  }, [app, dispatch, applySeed, config, random]);

  useKeyBindings(viewContext, handlers);

  // -- Layout ---------------------------------------------------------------

  return (
    <Box flexDirection="column">
      <TitleBar title={selectTitle({ phase, generation })} />
      <LifeCanvas grid={grid} cursor={phase === "setup" ? cursor : null} />
      {notification && (
        <Notification
          id={notification.id}
          message={notification.message}
          type={notification.type}
          onDismiss={dismissNotification}
        />
      )}
      <Footer
        viewContext={viewContext}
        status={selectStatus({ phase, grid, cursor, seedLabel })}
      />
    </Box>
  );
}
