import type { Logger } from "winston";
import { describeError } from "./errors";
import type { RelayMetrics } from "./metrics";
import type { PriceSource } from "./price-feed";
import { type BridgeEvent, describeEvent, missingEventFields } from "./types";

export type ValidationVerdict =
  | { readonly passed: true }
  | {
      readonly passed: false;
      readonly rule: string;
      readonly kind: "MalformedEvent" | "ValidationFailure";
      readonly reason: string;
    };

export interface ValidationRule {
  readonly name: string;
  evaluate(event: BridgeEvent): Promise<ValidationVerdict>;
}

export const REASON_MALFORMED = "malformed event";
export const REASON_BELOW_THRESHOLD = "below threshold";
export const REASON_MARKET_PRICE = "market price below processing threshold";

const PASS: ValidationVerdict = Object.freeze({ passed: true });

// ============================================================
//  Rules
// ============================================================

/** from/to/amount/nonce must all be present. Makes no network call. */
export function completenessRule(): ValidationRule {
  return {
    name: "completeness",
    async evaluate(event) {
      if (missingEventFields(event).length === 0) return PASS;
      return { passed: false, rule: "completeness", kind: "MalformedEvent", reason: REASON_MALFORMED };
    },
  };
}

/** Amount in the token's smallest unit must reach `minimum`. */
export function minimumAmountRule(minimum: bigint): ValidationRule {
  return {
    name: "minimum-amount",
    async evaluate(event) {
      if (event.amount === undefined) {
        return { passed: false, rule: "minimum-amount", kind: "MalformedEvent", reason: REASON_MALFORMED };
      }
      if (event.amount >= minimum) return PASS;
      return { passed: false, rule: "minimum-amount", kind: "ValidationFailure", reason: REASON_BELOW_THRESHOLD };
    },
  };
}

export interface MarketConditionOptions {
  feed: PriceSource;
  asset: string;
  minPriceUsd: number;
  logger: Logger;
  metrics: RelayMetrics;
}

/**
 * Rejects when the feed reports a price under `minPriceUsd`.
 * Feed failures pass: the relay keeps running without its oracle.
 */
export function marketConditionRule(options: MarketConditionOptions): ValidationRule {
  const { feed, asset, minPriceUsd, logger, metrics } = options;
  return {
    name: "market-condition",
    async evaluate(event) {
      let price: number;
      try {
        price = await feed.getUsdPrice(asset);
      } catch (err) {
        metrics.oracleDegradedTotal.inc();
        logger.warn(
          `ExternalServiceDegraded: price check skipped for ${describeEvent(event)}: ${describeError(err)}`
        );
        return PASS;
      }
      if (price >= minPriceUsd) return PASS;
      logger.info(`${asset} at ${price} USD is under the ${minPriceUsd} USD floor`);
      return { passed: false, rule: "market-condition", kind: "ValidationFailure", reason: REASON_MARKET_PRICE };
    },
  };
}

// ============================================================
//  Pipeline
// ============================================================

export interface StandardPipelineOptions {
  minTransferAmount: bigint;
  priceFeed: PriceSource;
  priceAsset: string;
  minMarketPriceUsd: number;
}

/**
 * Ordered, short-circuiting rule chain. Rejections are logged at warn and
 * counted; nothing here writes to a chain.
 */
export class ValidationPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly rules: readonly ValidationRule[],
    logger: Logger,
    private readonly metrics: RelayMetrics
  ) {
    this.logger = logger.child({ component: "ValidationPipeline" });
  }

  /** completeness → minimum amount → market condition */
  static standard(options: StandardPipelineOptions, logger: Logger, metrics: RelayMetrics): ValidationPipeline {
    return new ValidationPipeline(
      [
        completenessRule(),
        minimumAmountRule(options.minTransferAmount),
        marketConditionRule({
          feed: options.priceFeed,
          asset: options.priceAsset,
          minPriceUsd: options.minMarketPriceUsd,
          logger: logger.child({ component: "ValidationPipeline" }),
          metrics,
        }),
      ],
      logger,
      metrics
    );
  }

  async validate(event: BridgeEvent): Promise<ValidationVerdict> {
    for (const rule of this.rules) {
      const verdict = await rule.evaluate(event);
      if (!verdict.passed) {
        this.metrics.validationRejectionsTotal.inc({ rule: verdict.rule, reason: verdict.reason });
        this.logger.warn(`${verdict.kind}: ${describeEvent(event)} rejected: ${verdict.reason}`, {
          rule: verdict.rule,
        });
        return verdict;
      }
    }
    return PASS;
  }
}
