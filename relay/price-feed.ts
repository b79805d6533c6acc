import { ExternalServiceDegraded, describeError } from "./errors";

export const DEFAULT_PRICE_FEED_URL =
  "https://api.coingecko.com/api/v3/simple/price?ids=ethereum&vs_currencies=usd";

export type FetchFn = (
  url: string,
  init: { method: "GET"; headers: Record<string, string>; signal: AbortSignal }
) => Promise<Response>;

export interface PriceSource {
  /** USD price of `asset`. Throws ExternalServiceDegraded on any failure. */
  getUsdPrice(asset: string): Promise<number>;
}

export interface PriceFeedOptions {
  url?: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

/**
 * Simple-price market feed. Expects `{ "<asset>": { "usd": <number> } }`.
 */
export class PriceFeedClient implements PriceSource {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: PriceFeedOptions = {}) {
    this.url = options.url ?? DEFAULT_PRICE_FEED_URL;
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async getUsdPrice(asset: string): Promise<number> {
    let response: Response;
    try {
      response = await this.fetchFn(this.url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ExternalServiceDegraded(
        `Price feed unreachable: ${describeError(err)}`,
        "price-feed",
        { cause: err }
      );
    }

    if (!response.ok) {
      throw new ExternalServiceDegraded(
        `Price feed error: ${response.status} ${response.statusText}`,
        "price-feed"
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ExternalServiceDegraded("Price feed returned invalid JSON", "price-feed", { cause: err });
    }

    const price = extractUsdPrice(body, asset);
    if (price === null) {
      throw new ExternalServiceDegraded(
        `Price feed returned no usable ${asset} price: ${JSON.stringify(body)}`,
        "price-feed"
      );
    }
    return price;
  }
}

export function extractUsdPrice(body: unknown, asset: string): number | null {
  if (!isRecord(body)) return null;
  const quote = body[asset];
  if (!isRecord(quote)) return null;
  const usd = quote.usd;
  if (typeof usd !== "number" || !Number.isFinite(usd) || usd < 0) return null;
  return usd;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
