import type { PipelineKind, RunReport } from "../ingest/types";
import { describeError } from "../ingest/errors";

const HOUR_MS = 60 * 60_000;

export interface SchedulerOptions {
  /** Minute past each UTC hour at which runs fire. */
  minute: number;
  pipelines: readonly PipelineKind[];
  /** Runs one pipeline for the trigger instant `runAt`. */
  run: (pipeline: PipelineKind, runAt: Date) => Promise<RunReport>;
  runOnStartup?: boolean;
  now?: () => number;
}

/** Milliseconds from `nowMs` until the next `minute` past the hour (never 0). */
export function msUntilNextSlot(nowMs: number, minute: number): number {
  const offset = minute * 60_000;
  const slot = Math.floor((nowMs - offset) / HOUR_MS) * HOUR_MS + offset;
  return slot + HOUR_MS - nowMs;
}

export class HourlyScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly now: () => number;

  constructor(private readonly options: SchedulerOptions) {
    this.now = options.now ?? Date.now;
  }

  get started(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    if (this.options.runOnStartup) {
      void this.tick();
    }
    this.arm();
  }

  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  /**
   * Run every enabled pipeline for `runAt`, independently of each other and
   * of any tick still in progress. Never rejects.
   */
  async tick(runAt: Date = new Date(this.now())): Promise<void> {
    const { pipelines, run } = this.options;
    const settled = await Promise.allSettled(pipelines.map((pipeline) => run(pipeline, runAt)));
    settled.forEach((outcome, i) => {
      const pipeline = pipelines[i];
      if (outcome.status === "fulfilled") {
        console.log("[scheduler] run finished", { pipeline, runAt: runAt.toISOString(), status: outcome.value.status });
      } else {
        console.error("[scheduler] run threw", { pipeline, runAt: runAt.toISOString(), error: describeError(outcome.reason) });
      }
    });
  }

  private arm(): void {
    const nowMs = this.now();
    const delay = msUntilNextSlot(nowMs, this.options.minute);
    const slotAt = new Date(nowMs + delay);
    this.timer = setTimeout(() => {
      void this.tick(slotAt);
      this.arm();
    }, delay);
  }
}
