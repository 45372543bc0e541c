/**
 * Seed actions behind the setup-phase keys.
 *
 * Each returns either a fresh grid to install or a message explaining why
 * nothing changed, so a failed load never disturbs the current grid.
 */

import type { LifeConfig } from "@/lib/config/config.js";
import {
  PatternNotFoundError,
  PatternParseError,
  PatternReadError,
} from "@/lib/life/errors.js";
import { createRandom, type Grid } from "@/lib/life/grid.js";
import type { RandomSource } from "@/lib/life/types.js";
import { seedPattern, type PatternEntry } from "@/lib/patterns/registry.js";

export type SeedResult =
  | { ok: true; grid: Grid; label: string; message: string }
  | { ok: false; message: string };

type SeedConfig = Pick<LifeConfig, "surface" | "startFraction" | "patternsDir">;

export function seedRandom(config: SeedConfig, random: RandomSource): SeedResult {
  const grid = createRandom(config.surface, config.startFraction, random);
  return {
    ok: true,
    grid,
    label: "random",
    message: `Seeded ${grid.population} random cells`,
  };
}

/**
 * Load a registered pattern. Missing, unreadable or malformed files become
 * a failed result; any other error propagates.
 */
export function seedFromPattern(entry: PatternEntry, config: SeedConfig): SeedResult {
  try {
    const { grid, pattern, clipped } = seedPattern(entry, config.surface, config.patternsDir);
    const name = pattern.name ?? entry.label;
    const dropped =
      clipped.length > 0 ? ` (${clipped.length} cells outside the surface dropped)` : "";
    return { ok: true, grid, label: name, message: `Loaded ${name}${dropped}` };
  } catch (err) {
    if (
      err instanceof PatternNotFoundError ||
      err instanceof PatternReadError ||
      err instanceof PatternParseError
    ) {
      return { ok: false, message: err.message };
    }
    throw err;
  }
}
