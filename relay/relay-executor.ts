import { ethers } from "ethers";
import type { Logger } from "winston";
import { MINT_FUNCTION, PROCESSED_NONCES_FUNCTION } from "./abis";
import type { ChainLink } from "./chain-link";
import type { ValidatorCredential } from "./credential";
import { DestinationUnavailable, SubmissionError, describeError } from "./errors";
import type { RelayMetrics } from "./metrics";
import { RecentNonceCache } from "./nonce-cache";
import {
  type BridgeEvent,
  type RelayOutcome,
  type RelayRequest,
  describeEvent,
  requireCompleteEvent,
  toRelayRequest,
} from "./types";

export const DEFAULT_RELAY_GAS_LIMIT = 200_000n;

export interface RelayExecutorOptions {
  contractAddress: string;
  contractInterface: ethers.Interface;
  gasLimit?: bigint;
  recentNonceCacheSize?: number;
}

/**
 * Turns a validated event into a destination-chain mint, at most once per nonce.
 *
 * Order of gates: completeness, destination liveness, local recent-submission
 * cache, on-chain processedNonces. Only then is a transaction built, signed
 * and broadcast. Confirmation is not awaited.
 */
export class RelayExecutor {
  private readonly logger: Logger;
  private readonly gasLimit: bigint;
  private readonly recent: RecentNonceCache;

  constructor(
    private readonly destination: ChainLink,
    private readonly credential: ValidatorCredential,
    private readonly options: RelayExecutorOptions,
    logger: Logger,
    private readonly metrics: RelayMetrics
  ) {
    this.logger = logger.child({ component: "RelayExecutor" });
    this.gasLimit = options.gasLimit ?? DEFAULT_RELAY_GAS_LIMIT;
    this.recent = new RecentNonceCache(options.recentNonceCacheSize);
  }

  async relay(event: BridgeEvent): Promise<RelayOutcome> {
    const complete = requireCompleteEvent(event);
    const nonce = complete.nonce;

    if (!(await this.destination.isConnected())) {
      this.metrics.relaysTotal.inc({ status: "destination_unavailable" });
      throw new DestinationUnavailable(
        `Destination chain unavailable; ${describeEvent(event)} left for retry`
      );
    }

    if (this.recent.has(nonce)) {
      this.metrics.relaysTotal.inc({ status: "recently_submitted" });
      this.logger.info(`Nonce ${nonce} already submitted by this process, skipping`);
      return { status: "recently-submitted", nonce };
    }

    let processed: boolean;
    try {
      processed = await this.isProcessedOnChain(nonce);
    } catch (err) {
      this.metrics.relaysTotal.inc({ status: "destination_unavailable" });
      throw new DestinationUnavailable(
        `processedNonces(${nonce}) read failed: ${describeError(err)}`,
        { cause: err }
      );
    }
    if (processed) {
      this.recent.add(nonce);
      this.metrics.relaysTotal.inc({ status: "already_processed" });
      this.logger.info(`Nonce ${nonce} already processed on destination, skipping`);
      return { status: "already-processed", nonce };
    }

    const request = toRelayRequest(complete);
    const endTimer = this.metrics.relayDuration.startTimer();
    let txHash: string;
    try {
      txHash = await this.submit(request);
    } catch (err) {
      this.metrics.relaysTotal.inc({ status: "submission_error" });
      throw new SubmissionError(
        `Mint for nonce ${nonce} was not submitted: ${describeError(err)}`,
        nonce,
        { cause: err }
      );
    } finally {
      endTimer();
    }

    this.recent.add(nonce);
    this.metrics.relaysTotal.inc({ status: "submitted" });
    this.logger.info(
      `Submitted mint(${request.recipient}, ${request.amount}, ${request.sourceNonce}) tx ${txHash}`
    );
    return { status: "submitted", txHash, request };
  }

  private async isProcessedOnChain(nonce: bigint): Promise<boolean> {
    const contract = this.destination.bindContract(this.options.contractAddress, this.options.contractInterface);
    const result: unknown = await contract.getFunction(PROCESSED_NONCES_FUNCTION).staticCall(nonce);
    if (typeof result !== "boolean") {
      throw new Error(`${PROCESSED_NONCES_FUNCTION} returned ${String(result)}`);
    }
    return result;
  }

  private async submit(request: RelayRequest): Promise<string> {
    const data = this.options.contractInterface.encodeFunctionData(MINT_FUNCTION, [
      request.recipient,
      request.amount,
      request.sourceNonce,
    ]);
    const gasPrice = await this.destination.gasPrice();
    const accountNonce = await this.destination.pendingTransactionCount(this.credential.address);

    const signed = await this.credential.signTransaction({
      type: 0,
      chainId: BigInt(this.destination.endpoint.chainId),
      to: ethers.getAddress(this.options.contractAddress),
      data,
      value: 0n,
      gasLimit: this.gasLimit,
      gasPrice,
      nonce: accountNonce,
    });
    return this.destination.broadcast(signed);
  }
}
