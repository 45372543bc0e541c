#!/usr/bin/env node
/**
 * Entry point for the Game of Life terminal application.
 *
 * Loads configuration before anything is drawn: a bad config file or a
 * window that does not divide into cells aborts with exit status 1.
 * Uses React 18 -- Ink 5.x pairs with React 18.
 */

import React from "react";
import { render } from "ink";

import { loadConfig, type LifeConfig } from "@/lib/config/config.js";
import { ConfigError, SurfaceConfigError } from "@/lib/life/errors.js";
import { createLifeStore } from "@/lib/store/index.js";

import { App } from "./app.js";

function startupConfig(): LifeConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[config] ${err.path}: ${err.message}`);
      process.exit(1);
    }
    if (err instanceof SurfaceConfigError) {
      console.error(`[config] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = startupConfig();
const store = createLifeStore(config.surface);

const { waitUntilExit } = render(<App config={config} store={store} />, {
  patchConsole: false,
});

waitUntilExit()
  .then(() => {
    process.exit(0);
  })
  .catch((err: unknown) => {
    console.error("[cli] Terminal UI exited with an error:", err);
    process.exit(1);
  });
