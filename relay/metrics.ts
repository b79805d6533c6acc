/**
 * Prometheus instrumentation for the bridge relay.
 *
 * Metrics naming convention:  bridge_relay_<metric>_<unit>
 *
 * The registry is created per process by the entry point and handed to
 * every component; tests build their own so counters never leak between cases.
 */

import { Registry, Counter, Gauge, Histogram } from "prom-client";

export const POLLER_STATES = ["Idle", "Polling", "Reconnecting", "Stopped"] as const;

export function createRelayMetrics(registry: Registry = new Registry()) {
  return {
    registry,

    // ============================================================
    //  COUNTERS
    // ============================================================

    /** Log entries fetched from the source chain. */
    eventsObservedTotal: new Counter({
      name: "bridge_relay_events_observed_total",
      help: "Source-chain bridge events fetched by the poller",
      registers: [registry],
    }),

    /** Events rejected by the validation pipeline. */
    validationRejectionsTotal: new Counter({
      name: "bridge_relay_validation_rejections_total",
      help: "Events rejected by the validation pipeline",
      labelNames: ["rule", "reason"] as const,
      registers: [registry],
    }),

    relaysTotal: new Counter({
      name: "bridge_relay_relays_total",
      help: "Relay attempts by outcome",
      labelNames: ["status"] as const, // submitted | already_processed | recently_submitted | submission_error | destination_unavailable
      registers: [registry],
    }),

    /** Relays abandoned after exhausting automated retries. */
    relaysAbandonedTotal: new Counter({
      name: "bridge_relay_relays_abandoned_total",
      help: "Relays abandoned after the maximum number of submission attempts",
      registers: [registry],
    }),

    oracleDegradedTotal: new Counter({
      name: "bridge_relay_price_feed_degraded_total",
      help: "Price feed failures that let the market rule fail open",
      registers: [registry],
    }),

    reconnectAttemptsTotal: new Counter({
      name: "bridge_relay_reconnect_attempts_total",
      help: "Reconnect attempts by result",
      labelNames: ["result"] as const, // success | failure
      registers: [registry],
    }),

    // ============================================================
    //  GAUGES
    // ============================================================

    consecutiveFailures: new Gauge({
      name: "bridge_relay_consecutive_failures",
      help: "Consecutive poll or reconnect failures since the last successful poll",
      registers: [registry],
    }),

    lastPolledBlock: new Gauge({
      name: "bridge_relay_last_polled_block",
      help: "Highest source block whose events were fully processed",
      registers: [registry],
    }),

    /** 1 for the poller's current state, 0 for the others. */
    pollerState: new Gauge({
      name: "bridge_relay_poller_state",
      help: "Current event poller state",
      labelNames: ["state"] as const,
      registers: [registry],
    }),

    pendingRetries: new Gauge({
      name: "bridge_relay_pending_retries",
      help: "Events queued for another submission attempt",
      registers: [registry],
    }),

    // ============================================================
    //  HISTOGRAMS
    // ============================================================

    relayDuration: new Histogram({
      name: "bridge_relay_relay_duration_seconds",
      help: "Time from relay start to broadcast",
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
      registers: [registry],
    }),
  };
}

export type RelayMetrics = ReturnType<typeof createRelayMetrics>;

export function recordPollerState(metrics: RelayMetrics, state: (typeof POLLER_STATES)[number]): void {
  for (const candidate of POLLER_STATES) {
    metrics.pollerState.set({ state: candidate }, candidate === state ? 1 : 0);
  }
}
