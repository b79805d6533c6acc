import { ethers } from "ethers";
import { DEFAULT_EVENT_NAME, DEST_BRIDGE_ABI, MINT_FUNCTION, PROCESSED_NONCES_FUNCTION, SOURCE_BRIDGE_ABI } from "./abis";
import { ValidatorCredential } from "./credential";
import { ConfigError, describeError } from "./errors";
import { DEFAULT_PRICE_FEED_URL } from "./price-feed";
import { checkHTTPS, readAndValidatePrivateKey } from "./utils";

export interface ChainConfig {
  rpcUrl: string;
  chainId: number;
  contractAddress: string;
  contractInterface: ethers.Interface;
}

export interface BridgeConfig {
  source: ChainConfig;
  destination: ChainConfig;
  eventName: string;

  // Poller
  pollIntervalMs: number;
  reconnectBackoffMs: number;
  maxReconnectBackoffMs: number;
  resumeFromLastPolledBlock: boolean;
  maxBlockRange: number;

  // Validation
  minTransferAmount: bigint;        // smallest token unit
  priceFeedUrl: string;
  priceFeedAsset: string;
  minMarketPriceUsd: number;
  priceFeedTimeoutMs: number;

  // Relay
  credential: ValidatorCredential;  // never serialises the key
  relayGasLimit: bigint;
  maxSubmissionAttempts: number;
  recentNonceCacheSize: number;
  rpcTimeoutMs: number;

  // Ops
  healthPort: number;
  healthBindHost: string;
  shutdownTimeoutMs: number;
  logLevel: string;
  logJson: boolean;
}

/** Values copied from templates that must never reach a live deployment. */
const PLACEHOLDER_PATTERNS = [/your[_-]/i, /<[^>]*>/, /\$\{[^}]*\}/, /changeme/i, /placeholder/i];

export function isPlaceholder(value: string): boolean {
  return PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(value));
}

/**
 * Collects every problem before failing so one restart shows them all.
 */
class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: NodeJS.ProcessEnv) {}

  raw(name: string): string | undefined {
    const value = this.env[name]?.trim();
    if (value === undefined || value === "") return undefined;
    if (isPlaceholder(value)) {
      this.problems.push(`${name} still holds a placeholder value`);
      return undefined;
    }
    return value;
  }

  required(name: string): string {
    const value = this.raw(name);
    if (value === undefined && !this.problems.some((p) => p.startsWith(name + " "))) {
      this.problems.push(`${name} is required`);
    }
    return value ?? "";
  }

  int(name: string, fallback: number, min = 0): number {
    const value = this.raw(name);
    if (value === undefined) return fallback;
    if (!/^\d+$/.test(value) || parseInt(value, 10) < min) {
      this.problems.push(`${name} must be an integer >= ${min}, got "${value}"`);
      return fallback;
    }
    return parseInt(value, 10);
  }

  requiredInt(name: string, min: number): number {
    const value = this.required(name);
    if (!value) return 0;
    if (!/^\d+$/.test(value) || parseInt(value, 10) < min) {
      this.problems.push(`${name} must be an integer >= ${min}, got "${value}"`);
      return 0;
    }
    return parseInt(value, 10);
  }

  positiveNumber(name: string, fallback: number): number {
    const value = this.raw(name);
    if (value === undefined) return fallback;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
      this.problems.push(`${name} must be a non-negative number, got "${value}"`);
      return fallback;
    }
    return parsed;
  }

  bool(name: string, fallback: boolean): boolean {
    const value = this.raw(name);
    if (value === undefined) return fallback;
    if (value === "true" || value === "1") return true;
    if (value === "false" || value === "0") return false;
    this.problems.push(`${name} must be true or false, got "${value}"`);
    return fallback;
  }

  rpcUrl(name: string): string {
    const value = this.required(name);
    if (!value) return value;
    let protocol: string;
    try {
      protocol = new URL(value).protocol;
    } catch {
      this.problems.push(`${name} is not a valid URL`);
      return value;
    }
    if (!["http:", "https:", "ws:", "wss:"].includes(protocol)) {
      this.problems.push(`${name} must be an http(s) or ws(s) URL`);
      return value;
    }
    const insecure = checkHTTPS(value, name, this.env);
    if (insecure) this.problems.push(insecure);
    return value;
  }

  address(name: string): string {
    const value = this.required(name);
    if (!value) return value;
    if (!ethers.isAddress(value)) {
      this.problems.push(`${name} is not a valid 20-byte hex address`);
      return value;
    }
    if (ethers.getAddress(value) === ethers.ZeroAddress) {
      this.problems.push(`${name} must not be the zero address`);
    }
    return ethers.getAddress(value);
  }

  abi(name: string, fallback: ReadonlyArray<ethers.JsonFragment>): ethers.Interface {
    const value = this.raw(name);
    if (value === undefined) return new ethers.Interface(fallback);
    try {
      const parsed: unknown = JSON.parse(value);
      if (!isJsonAbi(parsed)) {
        this.problems.push(`${name} must be a JSON array of ABI fragments`);
        return new ethers.Interface(fallback);
      }
      return new ethers.Interface(parsed);
    } catch (err) {
      this.problems.push(`${name} is not a valid ABI: ${describeError(err)}`);
      return new ethers.Interface(fallback);
    }
  }
}

function isJsonAbi(value: unknown): value is ReadonlyArray<ethers.JsonFragment> {
  return (
    Array.isArray(value) &&
    value.every((item) => typeof item === "object" && item !== null && typeof item.type === "string")
  );
}

/**
 * Build the relay configuration from the environment. Throws ConfigError
 * listing every missing, placeholder or malformed value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, secretsDir?: string): BridgeConfig {
  const r = new EnvReader(env);

  const source: ChainConfig = {
    rpcUrl: r.rpcUrl("SOURCE_RPC_URL"),
    chainId: r.requiredInt("SOURCE_CHAIN_ID", 1),
    contractAddress: r.address("SOURCE_BRIDGE_CONTRACT"),
    contractInterface: r.abi("SOURCE_BRIDGE_ABI", SOURCE_BRIDGE_ABI),
  };
  const destination: ChainConfig = {
    rpcUrl: r.rpcUrl("DEST_RPC_URL"),
    chainId: r.requiredInt("DEST_CHAIN_ID", 1),
    contractAddress: r.address("DEST_BRIDGE_CONTRACT"),
    contractInterface: r.abi("DEST_BRIDGE_ABI", DEST_BRIDGE_ABI),
  };
  if (source.chainId > 0 && source.chainId === destination.chainId) {
    r.problems.push("SOURCE_CHAIN_ID and DEST_CHAIN_ID must differ");
  }

  const eventName = r.raw("EVENT_TO_LISTEN") ?? DEFAULT_EVENT_NAME;
  if (!source.contractInterface.getEvent(eventName)) {
    r.problems.push(`source ABI has no event ${eventName}`);
  }
  for (const fn of [MINT_FUNCTION, PROCESSED_NONCES_FUNCTION]) {
    if (!destination.contractInterface.getFunction(fn)) {
      r.problems.push(`destination ABI has no function ${fn}`);
    }
  }

  const validatorAddress = r.address("VALIDATOR_ADDRESS");
  let credential: ValidatorCredential | null = null;
  try {
    const key = readAndValidatePrivateKey("validator_private_key", "VALIDATOR_PRIVATE_KEY", env, secretsDir);
    if (!key) {
      r.problems.push("VALIDATOR_PRIVATE_KEY is required");
    } else if (isPlaceholder(key)) {
      r.problems.push("VALIDATOR_PRIVATE_KEY still holds a placeholder value");
    } else {
      credential = new ValidatorCredential(key);
      if (ethers.isAddress(validatorAddress) && credential.address !== ethers.getAddress(validatorAddress)) {
        r.problems.push(`VALIDATOR_PRIVATE_KEY does not belong to VALIDATOR_ADDRESS ${validatorAddress}`);
      }
    }
  } catch (err) {
    r.problems.push(describeError(err));
  }

  const tokenDecimals = r.int("TOKEN_DECIMALS", 18);
  const minTransferAmount = parseTokenAmount(r, "MIN_TRANSFER_AMOUNT", "0.01", tokenDecimals);

  const config = {
    source,
    destination,
    eventName,
    pollIntervalMs: r.int("POLL_INTERVAL_MS", 12_000, 1),
    reconnectBackoffMs: r.int("RECONNECT_BACKOFF_MS", 15_000, 1),
    maxReconnectBackoffMs: r.int("MAX_RECONNECT_BACKOFF_MS", 120_000, 1),
    resumeFromLastPolledBlock: r.bool("RESUME_FROM_LAST_POLLED_BLOCK", true),
    maxBlockRange: r.int("MAX_BLOCK_RANGE", 2_000, 1),
    minTransferAmount,
    priceFeedUrl: r.raw("PRICE_FEED_URL") ?? DEFAULT_PRICE_FEED_URL,
    priceFeedAsset: r.raw("PRICE_FEED_ASSET") ?? "ethereum",
    minMarketPriceUsd: r.positiveNumber("MIN_MARKET_PRICE_USD", 1_000),
    priceFeedTimeoutMs: r.int("PRICE_FEED_TIMEOUT_MS", 5_000, 1),
    relayGasLimit: BigInt(r.int("RELAY_GAS_LIMIT", 200_000, 21_000)),
    maxSubmissionAttempts: r.int("MAX_SUBMISSION_ATTEMPTS", 3, 1),
    recentNonceCacheSize: r.int("RECENT_NONCE_CACHE_SIZE", 10_000, 10),
    rpcTimeoutMs: r.int("RPC_TIMEOUT_MS", 30_000, 1),
    healthPort: r.int("HEALTH_PORT", 8080),
    healthBindHost: r.raw("HEALTH_BIND_HOST") ?? "127.0.0.1",
    shutdownTimeoutMs: r.int("SHUTDOWN_TIMEOUT_MS", 30_000, 1),
    logLevel: r.raw("LOG_LEVEL") ?? "info",
    logJson: (r.raw("LOG_FORMAT") ?? "text") === "json",
  };

  if (config.maxReconnectBackoffMs < config.reconnectBackoffMs) {
    r.problems.push("MAX_RECONNECT_BACKOFF_MS must be >= RECONNECT_BACKOFF_MS");
  }

  if (r.problems.length > 0 || credential === null) {
    throw new ConfigError(r.problems);
  }
  return { ...config, credential };
}

function parseTokenAmount(r: EnvReader, name: string, fallback: string, decimals: number): bigint {
  const value = r.raw(name) ?? fallback;
  try {
    const amount = ethers.parseUnits(value, decimals);
    if (amount < 0n) {
      r.problems.push(`${name} must not be negative`);
    }
    return amount;
  } catch {
    r.problems.push(`${name} is not a decimal token amount: "${value}"`);
    return 0n;
  }
}
