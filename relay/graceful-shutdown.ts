/**
 * graceful-shutdown.ts: signal handling and ordered cleanup for the relay
 *
 * Usage:
 *   const shutdown = new GracefulShutdown(logger, { timeoutMs: 30_000 });
 *   shutdown.registerCleanup("bridge", () => service.stop());
 *   shutdown.registerCleanup("health", () => closeServer(healthServer));
 *   shutdown.install(); // SIGINT, SIGTERM, unhandledRejection
 */

import type { Logger } from "winston";
import { describeError } from "./errors";

// ═══════════════════════════════════════════════════════════════════════════
//                          TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ShutdownOptions {
  /** Total budget (ms) for all cleanups before giving up on them. Default: 30000 */
  timeoutMs?: number;
  /** Exit code on clean shutdown. Default: 0 */
  exitCode?: number;
  /** Whether to call process.exit() at the end. Default: true (set false for tests) */
  exitOnComplete?: boolean;
}

export type CleanupFn = () => void | Promise<void>;

// ═══════════════════════════════════════════════════════════════════════════
//                      GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════

export class GracefulShutdown {
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly exitCode: number;
  private readonly exitOnComplete: boolean;

  /** Ordered cleanup callbacks, executed in registration order */
  private readonly cleanups: Array<{ name: string; fn: CleanupFn }> = [];

  private _isShuttingDown = false;
  private shutdownResolve: (() => void) | null = null;

  /** Resolves once every cleanup has finished or timed out. */
  public readonly shutdownComplete: Promise<void>;

  constructor(logger: Logger, options: ShutdownOptions = {}) {
    this.logger = logger.child({ component: "Shutdown" });
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.exitCode = options.exitCode ?? 0;
    this.exitOnComplete = options.exitOnComplete ?? true;

    this.shutdownComplete = new Promise<void>((resolve) => {
      this.shutdownResolve = resolve;
    });
  }

  // ─── Public API ──────────────────────────────────────────────────────

  get isShuttingDown(): boolean {
    return this._isShuttingDown;
  }

  registerCleanup(name: string, fn: CleanupFn): void {
    this.cleanups.push({ name, fn });
  }

  install(): void {
    process.on("SIGINT", () => {
      this.logger.info("SIGINT received");
      void this.initiateShutdown();
    });

    process.on("SIGTERM", () => {
      this.logger.info("SIGTERM received");
      void this.initiateShutdown();
    });

    process.on("unhandledRejection", (reason) => {
      this.logger.error(`Unhandled rejection: ${describeError(reason)}`);
      if (!this._isShuttingDown) {
        void this.initiateShutdown(1);
      }
    });

    this.logger.info(`Graceful shutdown installed (timeout=${this.timeoutMs}ms)`);
  }

  async initiateShutdown(overrideExitCode?: number): Promise<void> {
    if (this._isShuttingDown) {
      this.logger.info("Shutdown already in progress, ignoring duplicate signal");
      return;
    }
    this._isShuttingDown = true;
    const code = overrideExitCode ?? this.exitCode;

    this.logger.info("Initiating graceful shutdown...");
    await this.executeCleanups();

    this.logger.info("Shutdown complete");
    this.shutdownResolve?.();

    if (this.exitOnComplete) {
      process.exit(code);
    }
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Run cleanups in order, each bounded by timeoutMs / cleanups.length.
   * A failing or hanging cleanup does not stop the ones after it.
   */
  private async executeCleanups(): Promise<void> {
    if (this.cleanups.length === 0) return;

    const perCleanupTimeout = Math.max(1, Math.floor(this.timeoutMs / this.cleanups.length));

    for (const { name, fn } of this.cleanups) {
      this.logger.info(`Running cleanup: ${name}...`);
      try {
        const finished = await withTimeout(Promise.resolve().then(fn), perCleanupTimeout);
        if (!finished) {
          this.logger.warn(`Cleanup "${name}" timed out after ${perCleanupTimeout}ms`);
        }
      } catch (err) {
        this.logger.error(`Cleanup "${name}" failed: ${describeError(err)}`);
      }
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
//                          HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/** Resolves true if `work` settles first, false on timeout; the timer never outlives it. */
function withTimeout(work: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  return Promise.race([work.then(() => true), timeout]).finally(() => clearTimeout(timer));
}
