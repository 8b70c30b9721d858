import type { FastifyBaseLogger } from "fastify";
import type { WindowStore } from "../stores/window-store.js";
import type { MetricsService } from "./metrics.js";
import type { ViolationRecorder } from "./violation-recorder.js";

export interface CompactionSettings {
  intervalMs: number;
  graceSeconds: number;
  violationRetentionDays: number;
}

export interface CompactionResult {
  windowsPruned: number;
  violationsPurged: number;
}

/**
 * Background pruning of ended windows. Runs on its own timer, never on the
 * request path; a window is only pruned once it ended more than the grace
 * period ago, so a late request under clock skew still finds its row.
 */
export class WindowCompactor {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly windows: WindowStore,
    private readonly violations: ViolationRecorder,
    private readonly metrics: MetricsService,
    private readonly logger: FastifyBaseLogger,
    private readonly settings: CompactionSettings,
    private readonly clock: () => number = Date.now
  ) {}

  start(): void {
    if (this.timer || this.settings.intervalMs <= 0) {
      return;
    }

    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.settings.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Returns null when a previous pass is still running. */
  async runOnce(): Promise<CompactionResult | null> {
    if (this.running) {
      return null;
    }

    this.running = true;
    const nowMs = this.clock();
    const result: CompactionResult = { windowsPruned: 0, violationsPurged: 0 };

    try {
      result.windowsPruned = await this.windows.compact(nowMs - this.settings.graceSeconds * 1000);
      this.metrics.compactedWindowsTotal.inc(result.windowsPruned);

      if (this.settings.violationRetentionDays > 0) {
        result.violationsPurged = await this.violations.purgeOlderThan(this.settings.violationRetentionDays, nowMs);
      }

      if (result.windowsPruned > 0 || result.violationsPurged > 0) {
        this.logger.debug(result, "Compaction pass finished");
      }
    } catch (error) {
      this.logger.error({ err: error, backend: this.windows.backend }, "Compaction pass failed");
    } finally {
      this.running = false;
    }

    return result;
  }
}
