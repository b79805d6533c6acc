import { MalformedEvent } from "./errors";

/**
 * A source-chain lock event as observed in a log entry.
 *
 * The four business fields are optional because a log decoded against a
 * mismatched ABI may not carry them; the completeness rule rejects such
 * entries before anything else looks at them.
 */
export interface BridgeEvent {
  readonly sourceChainId: number;
  readonly sourceTxHash: string;
  readonly blockNumber: number;
  readonly logIndex: number;
  readonly fromAddress?: string;
  readonly toAddress?: string;
  readonly amount?: bigint;
  /** Sole idempotency key for relaying. */
  readonly nonce?: bigint;
}

export type CompleteBridgeEvent = BridgeEvent &
  Required<Pick<BridgeEvent, "fromAddress" | "toAddress" | "amount" | "nonce">>;

/** Arguments of the destination `mint` call, derived 1:1 from an event. */
export interface RelayRequest {
  readonly recipient: string;
  readonly amount: bigint;
  readonly sourceNonce: bigint;
}

export type RelayOutcome =
  | { readonly status: "submitted"; readonly txHash: string; readonly request: RelayRequest }
  | { readonly status: "already-processed"; readonly nonce: bigint }
  | { readonly status: "recently-submitted"; readonly nonce: bigint };

export const REQUIRED_EVENT_FIELDS = ["fromAddress", "toAddress", "amount", "nonce"] as const;

export function missingEventFields(event: BridgeEvent): string[] {
  return REQUIRED_EVENT_FIELDS.filter((field) => event[field] === undefined);
}

export function isCompleteEvent(event: BridgeEvent): event is CompleteBridgeEvent {
  return missingEventFields(event).length === 0;
}

export function requireCompleteEvent(event: BridgeEvent): CompleteBridgeEvent {
  if (isCompleteEvent(event)) {
    return event;
  }
  const missing = missingEventFields(event);
  throw new MalformedEvent(
    `Event ${describeEvent(event)} is missing ${missing.join(", ")}`,
    missing
  );
}

export function toRelayRequest(event: CompleteBridgeEvent): RelayRequest {
  return Object.freeze({
    recipient: event.toAddress,
    amount: event.amount,
    sourceNonce: event.nonce,
  });
}

/** Short identifier for log lines: `tx:logIndex` plus the nonce when known. */
export function describeEvent(event: BridgeEvent): string {
  const id = `${event.sourceTxHash}:${event.logIndex}`;
  return event.nonce === undefined ? id : `${id} (nonce ${event.nonce})`;
}
