import type { Logger } from "../../interfaces/logger.js";

export interface HeartbeatDeps {
  intervalMs: number;
  /** Consecutive failures after which the heartbeat gives up. */
  maxFailures: number;
  /** Sends one keep-alive and resolves with the server tick. */
  send: () => Promise<number>;
  onTick: (tick: number) => void;
  onFailure: (error: unknown, consecutiveFailures: number) => void;
  onRecovered: (afterFailures: number) => void;
  onLost: (error: unknown, consecutiveFailures: number) => void;
  logger: Logger;
}

/**
 * Keep-alive loop for a control-plane session.
 *
 * Ticks are chained: the next one is scheduled only after the previous request
 * settles, so two keep-alives never overlap. Once `stop()` returns no new tick
 * starts; a tick already in flight finishes but does not re-arm or report.
 */
export class Heartbeat {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private consecutiveFailures = 0;

  constructor(private readonly deps: HeartbeatDeps) {}

  get isRunning(): boolean {
    return this.running;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  /** Arm the loop; the first tick fires one interval from now. No-op when already running. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.consecutiveFailures = 0;
    this.schedule();
  }

  stop(): void {
    this.running = false;
    if (!this.timer) return;
    clearTimeout(this.timer);
    this.timer = null;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.beat().catch((err: unknown) => {
        this.deps.logger.error("Heartbeat listener threw", { error: err });
      });
    }, this.deps.intervalMs);
    this.timer.unref();
  }

  private async beat(): Promise<void> {
    if (!this.running) return;

    let tick: number;
    try {
      tick = await this.deps.send();
    } catch (err) {
      this.handleFailure(err);
      return;
    }

    if (!this.running) return;
    this.schedule();
    if (this.consecutiveFailures > 0) {
      const afterFailures = this.consecutiveFailures;
      this.consecutiveFailures = 0;
      this.notify("onRecovered", () => this.deps.onRecovered(afterFailures));
    }
    this.notify("onTick", () => this.deps.onTick(tick));
  }

  private handleFailure(err: unknown): void {
    if (!this.running) {
      this.deps.logger.debug?.("Heartbeat failed after stop", { error: err });
      return;
    }

    this.consecutiveFailures++;
    const failures = this.consecutiveFailures;
    if (failures >= this.deps.maxFailures) {
      this.running = false;
      this.notify("onFailure", () => this.deps.onFailure(err, failures));
      this.notify("onLost", () => this.deps.onLost(err, failures));
      return;
    }
    this.schedule();
    this.notify("onFailure", () => this.deps.onFailure(err, failures));
  }

  // Each callback runs on its own: one that throws must not hide the next.
  private notify(callback: string, run: () => void): void {
    try {
      run();
    } catch (err) {
      this.deps.logger.error("Heartbeat listener threw", { callback, error: err });
    }
  }
}
