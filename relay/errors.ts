/**
 * Typed failures raised by the bridge relay.
 *
 * Per-event failures (MalformedEvent, SubmissionError) stay local to the
 * event being processed. Connectivity failures (ConnectionError,
 * DestinationUnavailable) push the poller into its reconnect cycle.
 */

export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A chain node could not be reached or the session could not be established. */
export class ConnectionError extends BridgeError {}

/** An observed log entry lacks one of the fields a relay needs. */
export class MalformedEvent extends BridgeError {
  constructor(
    message: string,
    readonly missingFields: readonly string[],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The destination chain was not reachable at relay time; the event was not consumed. */
export class DestinationUnavailable extends BridgeError {}

/**
 * Building, signing or broadcasting the destination transaction failed.
 * The bridge action for `nonce` has NOT been performed.
 */
export class SubmissionError extends BridgeError {
  constructor(
    message: string,
    readonly nonce: bigint,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The price feed timed out, answered non-2xx, or returned an unusable payload. */
export class ExternalServiceDegraded extends BridgeError {
  constructor(
    message: string,
    readonly service: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigError extends BridgeError {
  constructor(readonly problems: readonly string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
  }
}

/** Best-effort message extraction for log lines. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
