/**
 * Drives the simulation while the store is in the `running` phase.
 *
 * Owns a single Ticker per mount. Each tick dispatches one TICK intent, so
 * generation N+1 is fully reduced before the next tick fires. The ticker
 * stops whenever the phase leaves `running` and on unmount.
 */

import { useEffect, useRef } from "react";

import { Ticker } from "@/lib/life/ticker.js";
import type { LifeStoreHook } from "@/lib/store/index.js";

export function useSimulationLoop(store: LifeStoreHook, fps: number): void {
  const tickerRef = useRef<Ticker | null>(null);
  const phase = store((s) => s.phase);

  if (tickerRef.current === null) {
    tickerRef.current = new Ticker(() => store.getState().dispatch({ type: "TICK" }), { fps });
  }
  const ticker = tickerRef.current;

  useEffect(() => {
    ticker.setFPS(fps);
  }, [ticker, fps]);

  useEffect(() => {
    if (phase !== "running") {
      ticker.stop();
      return;
    }
    ticker.start();
    return () => {
      ticker.stop();
    };
  }, [phase, ticker]);
}
