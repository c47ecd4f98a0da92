import { sweepStaleFiles } from "./lib/sweep";
import type { OutputStore } from "./services/output-store";

export type SweepCompletedPayload = {
  event: "output.sweep.completed";
  ts: string;
  outputsRemoved: number;
  scratchRemoved: number;
};

/**
 * Run one retention pass over the output store and the scratch directory.
 */
export async function sweepOnce(input: {
  outputStore: Pick<OutputStore, "sweepExpired">;
  scratchDir: string;
  scratchTtlMs: number;
  now: Date;
}): Promise<SweepCompletedPayload> {
  const outputs = await input.outputStore.sweepExpired(input.now);
  const scratch = await sweepStaleFiles({
    directory: input.scratchDir,
    maxAgeMs: input.scratchTtlMs,
    now: input.now
  });

  return {
    event: "output.sweep.completed",
    ts: input.now.toISOString(),
    outputsRemoved: outputs.length,
    scratchRemoved: scratch.length
  };
}

export function startOutputSweeper(input: {
  outputStore: Pick<OutputStore, "sweepExpired">;
  scratchDir: string;
  scratchTtlMs: number;
  intervalMs: number;
  onSweep: (payload: SweepCompletedPayload) => void;
  onError: (error: unknown) => void;
  now?: () => Date;
}): () => void {
  const now = input.now || (() => new Date());
  let running = false;

  const timer = setInterval(() => {
    // A slow pass is not overlapped by the next tick.
    if (running) {
      return;
    }
    running = true;
    void sweepOnce({
      outputStore: input.outputStore,
      scratchDir: input.scratchDir,
      scratchTtlMs: input.scratchTtlMs,
      now: now()
    })
      .then(input.onSweep, input.onError)
      .finally(() => {
        running = false;
      });
  }, input.intervalMs);

  timer.unref?.();
  return () => {
    clearInterval(timer);
  };
}
