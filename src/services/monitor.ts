/**
 * Monitor Loop
 *
 * Owns the RUNNING/STOPPED state and the periodic scan cycle. One cycle runs
 * at a time: scan all active watches, then wait the interval. Stopping cancels
 * the wait but lets an in-flight cycle finish. Manual scans run beside the
 * cycle and share nothing with it except storage.
 */
import { componentLogger } from "../logger";
import { errorMessage } from "../errors";
import type { ActivityRecorder } from "./activity";
import type { ScanStats } from "./watch-scanner";

const logger = componentLogger("monitor");

// Default configuration
const DEFAULT_INTERVAL_MS = 30_000;

export type MonitorState = "RUNNING" | "STOPPED";

/**
 * What the loop needs from the scanner
 */
export interface ScanRunner {
  scanAll(): Promise<ScanStats>;
}

export interface MonitorLoopConfig {
  scanner: ScanRunner;
  activity: ActivityRecorder;
  intervalMs?: number;
  onCycleComplete?: (stats: ScanStats) => void;
}

export class MonitorLoop {
  private scanner: ScanRunner;
  private activity: ActivityRecorder;
  private intervalMs: number;
  private onCycleComplete?: (stats: ScanStats) => void;

  private state: MonitorState = "STOPPED";
  private generation = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private manualScans = new Set<Promise<ScanStats | null>>();
  private lastStats: ScanStats | null = null;
  private cyclesCompleted = 0;

  constructor(config: MonitorLoopConfig) {
    this.scanner = config.scanner;
    this.activity = config.activity;
    this.intervalMs = config.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.onCycleComplete = config.onCycleComplete;
  }

  /**
   * Start the periodic cycle. No-op when already running.
   */
  async start(): Promise<void> {
    if (this.state === "RUNNING") {
      logger.debug("Monitor already running");
      return;
    }

    this.state = "RUNNING";
    const generation = ++this.generation;
    this.schedule(generation, 0);

    logger.info({ intervalMs: this.intervalMs }, "Monitor started");
    await this.activity.record(null, "system", "Monitor started");
  }

  /**
   * Stop scheduling cycles. A cycle already running is left to finish.
   */
  async stop(): Promise<void> {
    this.state = "STOPPED";
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    logger.info("Monitor stopped");
    await this.activity.record(null, "system", "Monitor stopped");
  }

  status(): MonitorState {
    return this.state;
  }

  /**
   * Run one scan now, outside the cadence. Never rejects.
   */
  triggerImmediateScan(): Promise<ScanStats | null> {
    const scan = this.runScan("manual").finally(() => {
      this.manualScans.delete(scan);
    });
    this.manualScans.add(scan);
    return scan;
  }

  /**
   * Stats of the most recent finished scan, periodic or manual
   */
  getStats(): { state: MonitorState; cyclesCompleted: number; lastScan: ScanStats | null } {
    return {
      state: this.state,
      cyclesCompleted: this.cyclesCompleted,
      lastScan: this.lastStats,
    };
  }

  /**
   * Resolves once no scan of any kind is running
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight || this.manualScans.size > 0) {
      await Promise.all([this.inFlight, ...this.manualScans]);
    }
  }

  /**
   * Schedule the next cycle of the given run
   */
  private schedule(generation: number, delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick(generation);
    }, delayMs);
  }

  /**
   * One cycle of the periodic chain
   */
  private async tick(generation: number): Promise<void> {
    if (generation !== this.generation || this.state !== "RUNNING") return;

    // A cycle from before a stop/start is still going; never overlap it
    if (this.inFlight) {
      await this.inFlight;
      if (generation !== this.generation || this.state !== "RUNNING") return;
    }

    const cycle = this.runScan("periodic").then(() => {
      this.cyclesCompleted++;
    });
    this.inFlight = cycle;
    await cycle;
    if (this.inFlight === cycle) {
      this.inFlight = null;
    }

    if (generation === this.generation && this.state === "RUNNING") {
      this.schedule(generation, this.intervalMs);
    }
  }

  /**
   * Run a scan, converting any failure into an error event
   */
  private async runScan(trigger: "periodic" | "manual"): Promise<ScanStats | null> {
    try {
      const stats = await this.scanner.scanAll();
      this.lastStats = stats;
      this.onCycleComplete?.(stats);
      return stats;
    } catch (error) {
      logger.error({ trigger, error: errorMessage(error) }, "Scan cycle failed");
      await this.activity.record(null, "error", `Monitor error: ${errorMessage(error)}`);
      return null;
    }
  }
}
