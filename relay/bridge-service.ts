import type { Logger } from "winston";
import { ChainLink, type ProviderFactory } from "./chain-link";
import { type Clock, systemClock } from "./clock";
import type { BridgeConfig } from "./config";
import { EventPoller, type PollerStatus } from "./event-poller";
import { ContractEventSource } from "./event-source";
import type { RelayMetrics } from "./metrics";
import { type FetchFn, PriceFeedClient, type PriceSource } from "./price-feed";
import { RelayExecutor } from "./relay-executor";
import { ValidationPipeline } from "./validation-pipeline";

export interface BridgeServiceDeps {
  logger: Logger;
  metrics: RelayMetrics;
  clock?: Clock;
  providerFactory?: ProviderFactory;
  /** Overrides the HTTP price feed built from the config. */
  priceFeed?: PriceSource;
  fetchFn?: FetchFn;
}

export interface BridgeStatus extends Record<string, unknown> {
  healthy: boolean;
  poller: PollerStatus;
  chains: { source: boolean; destination: boolean };
  validator: string;
}

/**
 * Owns one bridge instance: both chain links, the validation pipeline,
 * the relay executor and the poller that drives them.
 */
export class BridgeService {
  readonly source: ChainLink;
  readonly destination: ChainLink;
  private readonly poller: EventPoller;
  private readonly logger: Logger;
  private running: Promise<void> | null = null;

  constructor(
    private readonly config: BridgeConfig,
    deps: BridgeServiceDeps
  ) {
    const { logger, metrics } = deps;
    this.logger = logger.child({ component: "BridgeService" });

    const linkOptions = { logger, rpcTimeoutMs: config.rpcTimeoutMs, providerFactory: deps.providerFactory };
    this.source = new ChainLink(
      { label: "source", rpcUrl: config.source.rpcUrl, chainId: config.source.chainId },
      linkOptions
    );
    this.destination = new ChainLink(
      { label: "destination", rpcUrl: config.destination.rpcUrl, chainId: config.destination.chainId },
      linkOptions
    );

    const priceFeed =
      deps.priceFeed ??
      new PriceFeedClient({ url: config.priceFeedUrl, timeoutMs: config.priceFeedTimeoutMs, fetchFn: deps.fetchFn });

    const pipeline = ValidationPipeline.standard(
      {
        minTransferAmount: config.minTransferAmount,
        priceFeed,
        priceAsset: config.priceFeedAsset,
        minMarketPriceUsd: config.minMarketPriceUsd,
      },
      logger,
      metrics
    );

    const executor = new RelayExecutor(
      this.destination,
      config.credential,
      {
        contractAddress: config.destination.contractAddress,
        contractInterface: config.destination.contractInterface,
        gasLimit: config.relayGasLimit,
        recentNonceCacheSize: config.recentNonceCacheSize,
      },
      logger,
      metrics
    );

    const events = new ContractEventSource(
      this.source,
      {
        contractAddress: config.source.contractAddress,
        contractInterface: config.source.contractInterface,
        eventName: config.eventName,
        maxBlockRange: config.maxBlockRange,
      },
      logger
    );

    this.poller = new EventPoller(
      {
        source: events,
        pipeline,
        executor,
        reconnect: () => this.setup(),
        clock: deps.clock ?? systemClock,
        logger,
        metrics,
      },
      {
        pollIntervalMs: config.pollIntervalMs,
        reconnectBackoffMs: config.reconnectBackoffMs,
        maxReconnectBackoffMs: config.maxReconnectBackoffMs,
        resumeFromLastPolledBlock: config.resumeFromLastPolledBlock,
        maxSubmissionAttempts: config.maxSubmissionAttempts,
      }
    );
  }

  /** Connect both chains and bind both bridge contracts. */
  async setup(): Promise<void> {
    await this.source.connect();
    await this.destination.connect();
    this.source.bindContract(this.config.source.contractAddress, this.config.source.contractInterface);
    this.destination.bindContract(this.config.destination.contractAddress, this.config.destination.contractInterface);
    this.logger.info(
      `Bridge ready: chain ${this.config.source.chainId} -> chain ${this.config.destination.chainId}, validator ${this.config.credential.address}`
    );
  }

  /**
   * Initial setup, then the polling loop until stop(). Setup failures
   * propagate: a bridge that never came up is not retried.
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error("BridgeService already started");
    }
    await this.setup();
    this.running = this.poller.run();
    await this.running;
  }

  async stop(): Promise<void> {
    this.poller.stop();
    if (this.running) {
      await this.running;
    }
    this.source.disconnect();
    this.destination.disconnect();
    this.logger.info("Bridge stopped");
  }

  status(): BridgeStatus {
    const poller = this.poller.status();
    return {
      healthy: poller.state !== "Stopped",
      poller,
      chains: { source: this.source.hasSession, destination: this.destination.hasSession },
      validator: this.config.credential.address,
    };
  }
}
