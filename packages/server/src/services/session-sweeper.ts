/**
 * Session sweeper - periodically expires sessions idle beyond their TTL
 */

import type { Logger } from "pino";
import type { SessionManager } from "./session-manager.js";

export interface SweeperConfig {
  intervalMs: number;
}

export class SessionSweeper {
  private intervalId: NodeJS.Timeout | null = null;
  private running = false;
  private sweeping = false;

  // Metrics
  private totalSweeps = 0;
  private totalExpired = 0;
  private lastSweepTime = 0;

  constructor(
    private manager: SessionManager,
    private config: SweeperConfig,
    private log: Logger
  ) {}

  /**
   * Start background sweep task
   */
  start(): void {
    if (this.running) {
      this.log.warn("Session sweeper already running");
      return;
    }

    this.running = true;
    this.log.info(
      { intervalMs: this.config.intervalMs },
      "Starting session sweeper"
    );

    this.intervalId = setInterval(() => {
      this.runSweep().catch((err) => {
        this.log.error({ err }, "Periodic sweep failed");
      });
    }, this.config.intervalMs);
    this.intervalId.unref();
  }

  /**
   * Stop background sweep task
   */
  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
    this.running = false;
    this.log.info("Session sweeper stopped");
  }

  /**
   * Run a sweep immediately. Overlapping runs are skipped.
   */
  async runSweep(): Promise<string[]> {
    if (this.sweeping) {
      this.log.debug("Sweep already in progress, skipping");
      return [];
    }

    this.sweeping = true;
    const startTime = Date.now();

    try {
      const expired = await this.manager.sweep();

      this.totalSweeps++;
      this.totalExpired += expired.length;
      this.lastSweepTime = Date.now();

      if (expired.length > 0) {
        this.log.info(
          {
            expired: expired.length,
            remaining: this.manager.size,
            durationMs: this.lastSweepTime - startTime,
          },
          "Sweep completed"
        );
      }

      return expired;
    } finally {
      this.sweeping = false;
    }
  }

  /**
   * Get current metrics
   */
  getMetrics() {
    return {
      totalSweeps: this.totalSweeps,
      totalExpired: this.totalExpired,
      activeSessions: this.manager.size,
      lastSweepTime: this.lastSweepTime,
      running: this.running,
    };
  }
}
