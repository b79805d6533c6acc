import type { Logger } from "winston";
import type { Clock } from "./clock";
import { MalformedEvent, SubmissionError, describeError } from "./errors";
import type { EventFilter, EventSource, FilterAnchor } from "./event-source";
import { type RelayMetrics, recordPollerState } from "./metrics";
import { RecentNonceCache } from "./nonce-cache";
import { type BridgeEvent, type RelayOutcome, describeEvent } from "./types";
import type { ValidationVerdict } from "./validation-pipeline";

export type PollerStateName = "Idle" | "Polling" | "Reconnecting" | "Stopped";

type LoopState =
  | { readonly kind: "Idle" }
  | { readonly kind: "Polling"; readonly filter: EventFilter }
  | { readonly kind: "Reconnecting" }
  | { readonly kind: "Stopped" };

export interface EventValidator {
  validate(event: BridgeEvent): Promise<ValidationVerdict>;
}

export interface EventRelayer {
  relay(event: BridgeEvent): Promise<RelayOutcome>;
}

export interface ReconnectState {
  consecutiveFailures: number;
  /** Clock time of the last poll that completed, null before the first. */
  lastSuccessfulPollAt: number | null;
}

export interface PollerStatus extends ReconnectState {
  state: PollerStateName;
  lastPolledBlock: number | null;
  pendingRetries: number;
}

export interface EventPollerDeps {
  source: EventSource;
  pipeline: EventValidator;
  executor: EventRelayer;
  /** Re-runs full component setup: both chains reconnected, contracts re-bound. */
  reconnect: () => Promise<void>;
  clock: Clock;
  logger: Logger;
  metrics: RelayMetrics;
}

export interface EventPollerOptions {
  pollIntervalMs?: number;
  reconnectBackoffMs?: number;
  /** Backoff doubles per consecutive failure up to this ceiling. */
  maxReconnectBackoffMs?: number;
  /**
   * Re-open filters at the first block not fully processed instead of at
   * the chain head, so events emitted during an outage are still seen.
   */
  resumeFromLastPolledBlock?: boolean;
  maxSubmissionAttempts?: number;
}

interface PendingRetry {
  event: BridgeEvent;
  attempts: number;
}

/**
 * Drives the observe → validate → relay loop.
 *
 *   Idle ──filter opened──▶ Polling ──fetch/relay failure──▶ Reconnecting
 *                             ▲                                  │
 *                             └────setup + filter re-opened──────┘
 *   any state ──stop()──▶ Stopped (observed between cycles)
 *
 * Events are handled one at a time in log order; a relay never overlaps
 * the next one.
 */
export class EventPoller {
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly reconnectBackoffMs: number;
  private readonly maxReconnectBackoffMs: number;
  private readonly resumeFromLastPolledBlock: boolean;
  private readonly maxSubmissionAttempts: number;

  private state: LoopState = { kind: "Idle" };
  private readonly reconnectState: ReconnectState = { consecutiveFailures: 0, lastSuccessfulPollAt: null };
  /** First source block whose events have not all been handled. */
  private resumeBlock: number | null = null;
  private readonly retries = new Map<string, PendingRetry>();
  /** Nonces given up on; redeliveries are left for the operator. */
  private readonly abandoned = new RecentNonceCache();
  private stopRequested = false;
  private readonly wake = new AbortController();

  constructor(
    private readonly deps: EventPollerDeps,
    options: EventPollerOptions = {}
  ) {
    this.logger = deps.logger.child({ component: "EventPoller" });
    this.pollIntervalMs = options.pollIntervalMs ?? 12_000;
    this.reconnectBackoffMs = options.reconnectBackoffMs ?? 15_000;
    this.maxReconnectBackoffMs = Math.max(
      this.reconnectBackoffMs,
      options.maxReconnectBackoffMs ?? 120_000
    );
    this.resumeFromLastPolledBlock = options.resumeFromLastPolledBlock ?? true;
    this.maxSubmissionAttempts = options.maxSubmissionAttempts ?? 3;
    recordPollerState(deps.metrics, "Idle");
  }

  get stateName(): PollerStateName {
    return this.state.kind;
  }

  status(): PollerStatus {
    return {
      state: this.state.kind,
      consecutiveFailures: this.reconnectState.consecutiveFailures,
      lastSuccessfulPollAt: this.reconnectState.lastSuccessfulPollAt,
      lastPolledBlock: this.resumeBlock === null ? null : this.resumeBlock - 1,
      pendingRetries: this.retries.size,
    };
  }

  /**
   * Runs until stop() is observed. Resolves once Stopped; never rejects on
   * chain or network failures, which are retried indefinitely.
   */
  async run(): Promise<void> {
    if (this.stateName !== "Idle") {
      throw new Error(`EventPoller cannot run from state ${this.stateName}`);
    }
    this.logger.info("Event poller started");

    while (!this.stopRequested) {
      const current = this.state;
      switch (current.kind) {
        case "Idle":
          this.transition(await this.openFilter());
          break;
        case "Polling":
          await this.pollCycle(current.filter);
          break;
        case "Reconnecting":
          await this.reconnectCycle();
          break;
        case "Stopped":
          return;
      }
    }

    this.transition({ kind: "Stopped" });
    this.logger.info("Event poller stopped");
  }

  /** Request a stop; a sleeping poller wakes at once, an in-flight batch finishes first. */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.wake.abort();
  }

  // ─── Cycles ──────────────────────────────────────────────────────────

  private async pollCycle(filter: EventFilter): Promise<void> {
    try {
      await this.retryFailedSubmissions();
      await this.processNewEntries(filter);
    } catch (err) {
      this.transition(this.recordFailure("Poll failed", err));
      return;
    }
    this.reconnectState.consecutiveFailures = 0;
    this.reconnectState.lastSuccessfulPollAt = this.deps.clock.now();
    this.deps.metrics.consecutiveFailures.set(0);
    await this.deps.clock.sleep(this.pollIntervalMs, this.wake.signal);
  }

  private async reconnectCycle(): Promise<void> {
    const delay = this.backoffDelay();
    this.logger.info(`Reconnecting in ${delay}ms (consecutive failures: ${this.reconnectState.consecutiveFailures})`);
    await this.deps.clock.sleep(delay, this.wake.signal);
    if (this.stopRequested) return;

    try {
      await this.deps.reconnect();
    } catch (err) {
      this.deps.metrics.reconnectAttemptsTotal.inc({ result: "failure" });
      this.transition(this.recordFailure("Reconnect attempt failed", err));
      return;
    }
    this.deps.metrics.reconnectAttemptsTotal.inc({ result: "success" });
    this.transition(await this.openFilter());
  }

  private async processNewEntries(filter: EventFilter): Promise<void> {
    const events = await filter.getNewEntries();
    if (events.length > 0) {
      this.deps.metrics.eventsObservedTotal.inc(events.length);
      this.logger.info(`Fetched ${events.length} new event(s)`);
    }
    for (const event of events) {
      try {
        await this.handle(event);
      } catch (err) {
        // Redeliver from this event's block after reconnecting
        this.markPolledThrough(event.blockNumber);
        throw err;
      }
    }
    this.markPolledThrough(filter.nextBlock);
  }

  private async handle(event: BridgeEvent): Promise<void> {
    if (event.nonce !== undefined && this.ownedElsewhere(event.nonce)) {
      this.logger.debug(`Skipping redelivered ${describeEvent(event)}: retry queued or abandoned`);
      return;
    }
    const verdict = await this.deps.pipeline.validate(event);
    if (!verdict.passed) {
      return;
    }
    await this.relay(event, 0);
  }

  /** Relay and absorb per-event failures; connectivity failures propagate. */
  private async relay(event: BridgeEvent, previousAttempts: number): Promise<void> {
    let outcome: RelayOutcome;
    try {
      outcome = await this.deps.executor.relay(event);
    } catch (err) {
      if (err instanceof SubmissionError) {
        this.queueRetry(event, err, previousAttempts + 1);
        return;
      }
      if (err instanceof MalformedEvent) {
        this.logger.warn(`MalformedEvent: ${err.message}`);
        return;
      }
      throw err;
    }
    if (outcome.status === "submitted") {
      this.logger.info(`Relayed ${describeEvent(event)} in tx ${outcome.txHash}`);
    }
  }

  /** The retry queue or an earlier abandonment already decided this nonce's fate. */
  private ownedElsewhere(nonce: bigint): boolean {
    return this.retries.has(nonce.toString()) || this.abandoned.has(nonce);
  }

  private queueRetry(event: BridgeEvent, err: SubmissionError, attempts: number): void {
    const key = err.nonce.toString();
    if (attempts >= this.maxSubmissionAttempts) {
      this.retries.delete(key);
      this.abandoned.add(err.nonce);
      this.deps.metrics.relaysAbandonedTotal.inc();
      this.logger.error(
        `Relay ABANDONED after ${attempts} attempt(s); bridge action for ${describeEvent(event)} NOT performed, operator action required: ${err.message}`,
        { alert: "dropped_relay", nonce: err.nonce, attempts }
      );
    } else {
      this.retries.set(key, { event, attempts });
      this.logger.error(
        `Relay submission failed; bridge action for ${describeEvent(event)} NOT performed (attempt ${attempts}/${this.maxSubmissionAttempts}): ${err.message}`,
        { alert: "dropped_relay", nonce: err.nonce, attempts }
      );
    }
    this.deps.metrics.pendingRetries.set(this.retries.size);
  }

  private async retryFailedSubmissions(): Promise<void> {
    for (const [key, pending] of [...this.retries]) {
      this.retries.delete(key);
      try {
        await this.relay(pending.event, pending.attempts);
      } catch (err) {
        // Keep it queued; the connectivity failure sends the loop to Reconnecting
        this.retries.set(key, pending);
        throw err;
      } finally {
        this.deps.metrics.pendingRetries.set(this.retries.size);
      }
    }
  }

  // ─── State helpers ───────────────────────────────────────────────────

  private async openFilter(): Promise<LoopState> {
    const anchor: FilterAnchor =
      this.resumeFromLastPolledBlock && this.resumeBlock !== null
        ? { kind: "block", fromBlock: this.resumeBlock }
        : { kind: "latest" };
    try {
      const filter = await this.deps.source.openFilter(anchor);
      this.markPolledThrough(filter.nextBlock);
      return { kind: "Polling", filter };
    } catch (err) {
      return this.recordFailure("Opening event filter failed", err);
    }
  }

  private markPolledThrough(nextBlock: number): void {
    this.resumeBlock = nextBlock;
    this.deps.metrics.lastPolledBlock.set(nextBlock - 1);
  }

  private recordFailure(what: string, err: unknown): LoopState {
    this.reconnectState.consecutiveFailures += 1;
    this.deps.metrics.consecutiveFailures.set(this.reconnectState.consecutiveFailures);
    this.logger.error(
      `${what} (consecutive failures: ${this.reconnectState.consecutiveFailures}): ${describeError(err)}`
    );
    return { kind: "Reconnecting" };
  }

  /** base × 2^(failures-1), capped. */
  backoffDelay(): number {
    const exponent = Math.max(0, this.reconnectState.consecutiveFailures - 1);
    return Math.min(this.reconnectBackoffMs * 2 ** Math.min(exponent, 30), this.maxReconnectBackoffMs);
  }

  private transition(next: LoopState): void {
    if (next.kind !== this.state.kind) {
      this.logger.info(`${this.state.kind} -> ${next.kind}`);
    }
    this.state = next;
    recordPollerState(this.deps.metrics, next.kind);
  }
}
