import type { SweepExpiredResponse } from "@chrono/shared";
import type { LifecycleContext } from "../context.js";
import type { EscrowContractManager } from "./escrow-manager.js";

/**
 * Background poller that expires overdue contracts. One sweep runs at a
 * time; the next is scheduled only after the previous one finished.
 */
export class ExpirySweeper {
  private isRunning = false;
  private pollTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly ctx: LifecycleContext,
    private readonly escrow: EscrowContractManager,
    private readonly intervalMs: number = ctx.config.expirySweepIntervalMs,
  ) {}

  get running(): boolean {
    return this.isRunning;
  }

  start(): void {
    if (this.isRunning || this.intervalMs <= 0) return;
    this.isRunning = true;
    this.ctx.logger.info({ intervalMs: this.intervalMs }, "expiry sweeper started");
    this.schedule();
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.inFlight) await this.inFlight;
    this.ctx.logger.info("expiry sweeper stopped");
  }

  runOnce(): Promise<SweepExpiredResponse> {
    return this.escrow.sweepExpired();
  }

  private schedule(): void {
    this.pollTimer = setTimeout(() => {
      this.inFlight = this.tick().finally(() => {
        this.inFlight = null;
      });
    }, this.intervalMs);
    this.pollTimer.unref();
  }

  private async tick(): Promise<void> {
    if (!this.isRunning) return;
    try {
      const { expired, skipped } = await this.runOnce();
      if (skipped.length > 0) {
        this.ctx.logger.warn({ skipped }, "expiry sweep skipped contracts");
      }
      if (expired.length > 0) {
        this.ctx.logger.info({ expired }, "expired overdue escrows");
      }
    } catch (error) {
      this.ctx.logger.error({ err: error }, "expiry sweep failed");
    }
    if (this.isRunning) this.schedule();
  }
}
