import { ethers } from "ethers";
import type { Logger } from "winston";
import { ConnectionError, describeError } from "./errors";
import { sanitizeUrl } from "./utils";

export interface ChainEndpoint {
  /** "source" or "destination"; used in log lines and errors. */
  label: string;
  rpcUrl: string;
  chainId: number;
}

export type ProviderFactory = (endpoint: ChainEndpoint, rpcTimeoutMs: number) => ethers.JsonRpcProvider;

export interface ChainLinkOptions {
  logger: Logger;
  rpcTimeoutMs?: number;
  providerFactory?: ProviderFactory;
}

// ============================================================
//  Proof-of-authority block headers
// ============================================================

const EMPTY_NONCE = "0x0000000000000000";

/**
 * Fill the header fields generic block formatting insists on but PoA chains
 * (Clique, IBFT, Polygon's Bor) omit or leave null. extraData is kept as-is:
 * on PoA chains it carries the 65-byte sealer signature.
 */
export function normalizePoaBlock(raw: unknown): unknown {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    return raw;
  }
  const block: Record<string, unknown> = { ...raw };
  if (block.difficulty == null) block.difficulty = "0x0";
  if (block.nonce == null) block.nonce = EMPTY_NONCE;
  if (block.mixHash == null) block.mixHash = ethers.ZeroHash;
  if (block.extraData == null) block.extraData = "0x";
  return block;
}

/** JsonRpcProvider whose block responses pass through {@link normalizePoaBlock}. */
export class PoaCompatibleProvider extends ethers.JsonRpcProvider {
  override async _perform(req: ethers.PerformActionRequest): Promise<unknown> {
    const result: unknown = await super._perform(req);
    return req.method === "getBlock" ? normalizePoaBlock(result) : result;
  }
}

export const defaultProviderFactory: ProviderFactory = (endpoint, rpcTimeoutMs) => {
  const request = new ethers.FetchRequest(endpoint.rpcUrl);
  request.timeout = rpcTimeoutMs;
  const network = ethers.Network.from(endpoint.chainId);
  // cacheTimeout -1: gas price and processed-nonce reads must always hit the node
  return new PoaCompatibleProvider(request, network, {
    staticNetwork: network,
    batchMaxCount: 1,
    cacheTimeout: -1,
  });
};

// ============================================================
//  ChainLink
// ============================================================

/**
 * Handle to one chain's JSON-RPC node. Reconnected in place after outages;
 * performs no retries of its own.
 */
export class ChainLink {
  readonly endpoint: ChainEndpoint;
  private readonly logger: Logger;
  private readonly rpcTimeoutMs: number;
  private readonly providerFactory: ProviderFactory;
  private provider: ethers.JsonRpcProvider | null = null;

  constructor(endpoint: ChainEndpoint, options: ChainLinkOptions) {
    this.endpoint = endpoint;
    this.rpcTimeoutMs = options.rpcTimeoutMs ?? 30_000;
    this.providerFactory = options.providerFactory ?? defaultProviderFactory;
    this.logger = options.logger.child({ component: `ChainLink:${endpoint.label}` });
  }

  /**
   * Replace any existing session with a fresh, probed one.
   * Throws ConnectionError if the node is unreachable or on another chain.
   */
  async connect(): Promise<void> {
    this.disconnect();
    const target = sanitizeUrl(this.endpoint.rpcUrl);
    let provider: ethers.JsonRpcProvider | null = null;
    try {
      provider = this.providerFactory(this.endpoint, this.rpcTimeoutMs);
      const reported: unknown = await provider.send("eth_chainId", []);
      const chainId = Number(ethers.getBigInt(toBigNumberish(reported)));
      if (chainId !== this.endpoint.chainId) {
        throw new Error(`node reports chain ${chainId}, expected ${this.endpoint.chainId}`);
      }
      const head = await provider.getBlockNumber();
      this.provider = provider;
      this.logger.info(`Connected to ${target} (chain ${chainId}, head ${head})`);
    } catch (err) {
      provider?.destroy();
      throw new ConnectionError(
        `Cannot connect to ${this.endpoint.label} chain at ${target}: ${describeError(err)}`,
        { cause: err }
      );
    }
  }

  /** A session exists; says nothing about whether the node still answers. */
  get hasSession(): boolean {
    return this.provider !== null;
  }

  disconnect(): void {
    if (this.provider) {
      this.provider.destroy();
      this.provider = null;
    }
  }

  /** Session present and the node answers a liveness probe. Never throws. */
  async isConnected(): Promise<boolean> {
    if (!this.provider) {
      return false;
    }
    try {
      await this.provider.getBlockNumber();
      return true;
    } catch (err) {
      this.logger.warn(`Liveness probe failed: ${describeError(err)}`);
      return false;
    }
  }

  /** Current head height, or -1 when not connected or the query fails. */
  async latestBlock(): Promise<number> {
    if (!this.provider) {
      return -1;
    }
    try {
      return await this.provider.getBlockNumber();
    } catch (err) {
      this.logger.warn(`Block height query failed: ${describeError(err)}`);
      return -1;
    }
  }

  bindContract(address: string, abi: ethers.Interface | ethers.InterfaceAbi): ethers.Contract {
    return new ethers.Contract(ethers.getAddress(address), abi, this.session());
  }

  async getLogs(filter: ethers.Filter): Promise<ethers.Log[]> {
    return this.session().getLogs(filter);
  }

  /** Live gas price; never served from a cache. */
  async gasPrice(): Promise<bigint> {
    const raw: unknown = await this.session().send("eth_gasPrice", []);
    return ethers.getBigInt(toBigNumberish(raw));
  }

  async pendingTransactionCount(address: string): Promise<number> {
    return this.session().getTransactionCount(address, "pending");
  }

  /** Broadcast a signed transaction and return its hash without waiting for inclusion. */
  async broadcast(signedTx: string): Promise<string> {
    const response = await this.session().broadcastTransaction(signedTx);
    return response.hash;
  }

  private session(): ethers.JsonRpcProvider {
    if (!this.provider) {
      throw new ConnectionError(`${this.endpoint.label} chain is not connected`);
    }
    return this.provider;
  }
}

function toBigNumberish(value: unknown): ethers.BigNumberish {
  if (typeof value === "string" || typeof value === "number" || typeof value === "bigint") {
    return value;
  }
  throw new Error(`unexpected RPC result ${JSON.stringify(value)}`);
}
