/**
 * Global + phase-specific keyboard handler.
 *
 * Bridges Ink's `useInput` hook with the declarative binding map from
 * `@/lib/keys/bindings.ts`. Callers pass a context (the current phase)
 * and a handler map keyed by action name.
 */

import { useInput } from "ink";

import { resolveKeyPress } from "@/lib/keys/resolve.js";
import type { InkKeyInput, ViewContext } from "@/lib/keys/types.js";

/**
 * Register keyboard handlers for the active phase.
 *
 * @param handlers - Map of action name to callback. Actions without a
 *                   handler are ignored.
 */
export function useKeyBindings(
  context: ViewContext,
  handlers: Record<string, () => void>,
): void {
  useInput((input: string, key: InkKeyInput) => {
    const binding = resolveKeyPress(input, key, context);
    if (!binding) return;

    const handler = handlers[binding.action];
    if (handler) {
      handler();
    }
  });
}
