import { ethers } from "ethers";
import { PoaCompatibleProvider } from "../../chain-link";

interface StoredLog {
  address: string;
  topics: string[];
  data: string;
  blockNumber: number;
  logIndex: number;
  transactionHash: string;
}

/**
 * Just enough of an EVM node for the relay: head height, gas price,
 * account nonces, processedNonces reads, raw transaction intake and logs.
 */
export class InMemoryChain {
  head = 100;
  gasPrice = 1_000_000_000n;
  /** Every request fails as if the node were unreachable. */
  down = false;
  /** eth_getLogs over more blocks than this fails, as on nodes that cap ranges. */
  maxLogRange: number | null = null;
  /** Next eth_sendRawTransaction fails with this error. */
  sendRawError: Error | null = null;
  readonly processedNonces = new Set<bigint>();
  readonly submitted: ethers.Transaction[] = [];
  readonly calls: string[] = [];
  private readonly txCounts = new Map<string, number>();
  private readonly logs: StoredLog[] = [];

  constructor(
    readonly chainId: number,
    private readonly contractInterface?: ethers.Interface
  ) {}

  emitEvent(
    contractAddress: string,
    iface: ethers.Interface,
    eventName: string,
    values: ReadonlyArray<unknown>,
    blockNumber: number
  ): void {
    const { data, topics } = iface.encodeEventLog(eventName, values);
    const logIndex = this.logs.filter((log) => log.blockNumber === blockNumber).length;
    this.logs.push({
      address: contractAddress.toLowerCase(),
      topics,
      data,
      blockNumber,
      logIndex,
      transactionHash: ethers.id(`tx-${blockNumber}-${logIndex}`),
    });
  }

  handle(method: string, params: ReadonlyArray<unknown>): unknown {
    this.calls.push(method);
    if (this.down) {
      throw new Error("connect ECONNREFUSED 127.0.0.1:8545");
    }
    switch (method) {
      case "eth_chainId":
        return ethers.toQuantity(this.chainId);
      case "eth_blockNumber":
        return ethers.toQuantity(this.head);
      case "eth_gasPrice":
        return ethers.toQuantity(this.gasPrice);
      case "eth_getTransactionCount":
        return ethers.toQuantity(this.txCounts.get(String(params[0]).toLowerCase()) ?? 0);
      case "eth_call":
        return this.call(params[0]);
      case "eth_sendRawTransaction":
        return this.sendRaw(String(params[0]));
      case "eth_getLogs":
        return this.getLogs(params[0]);
      default:
        throw new Error(`unsupported method ${method}`);
    }
  }

  private call(request: unknown): string {
    if (!this.contractInterface || !isRecord(request) || typeof request.data !== "string") {
      throw new Error("unsupported eth_call");
    }
    const parsed = this.contractInterface.parseTransaction({ data: request.data });
    const nonce: unknown = parsed?.args[0];
    if (parsed?.name !== "processedNonces" || typeof nonce !== "bigint") {
      throw new Error("unsupported eth_call");
    }
    return this.contractInterface.encodeFunctionResult("processedNonces", [this.processedNonces.has(nonce)]);
  }

  private sendRaw(raw: string): string {
    if (this.sendRawError) {
      const err = this.sendRawError;
      this.sendRawError = null;
      throw err;
    }
    const tx = ethers.Transaction.from(raw);
    if (tx.hash === null) {
      throw new Error("transaction is not signed");
    }
    const sender = (tx.from ?? "").toLowerCase();
    const expected = this.txCounts.get(sender) ?? 0;
    if (tx.nonce !== expected) {
      throw new Error("nonce too low");
    }
    this.txCounts.set(sender, expected + 1);
    this.submitted.push(tx);

    const parsed = this.contractInterface?.parseTransaction({ data: tx.data });
    const nonce: unknown = parsed?.args[2];
    if (parsed?.name === "mint" && typeof nonce === "bigint") {
      this.processedNonces.add(nonce);
    }
    return tx.hash;
  }

  private getLogs(filter: unknown): unknown[] {
    if (!isRecord(filter)) {
      throw new Error("invalid filter");
    }
    const from = Number(filter.fromBlock);
    const to = Number(filter.toBlock);
    if (this.maxLogRange !== null && to - from + 1 > this.maxLogRange) {
      throw new Error(`block range ${from}-${to} exceeds the node limit of ${this.maxLogRange}`);
    }
    const rawAddress = filter.address;
    const addresses = (Array.isArray(rawAddress) ? rawAddress : rawAddress == null ? [] : [rawAddress]).map((a) =>
      String(a).toLowerCase()
    );
    const topic0 = Array.isArray(filter.topics) ? filter.topics[0] : undefined;

    return this.logs
      .filter((log) => log.blockNumber >= from && log.blockNumber <= to)
      .filter((log) => addresses.length === 0 || addresses.includes(log.address))
      .filter((log) => typeof topic0 !== "string" || log.topics[0] === topic0.toLowerCase())
      .map((log) => ({
        address: log.address,
        topics: log.topics,
        data: log.data,
        blockNumber: ethers.toQuantity(log.blockNumber),
        blockHash: ethers.zeroPadValue(ethers.toBeHex(log.blockNumber), 32),
        logIndex: ethers.toQuantity(log.logIndex),
        transactionHash: log.transactionHash,
        transactionIndex: "0x0",
        removed: false,
      }));
  }
}

/** A real ethers provider whose transport is an {@link InMemoryChain}. */
export class FakeRpcProvider extends PoaCompatibleProvider {
  constructor(readonly chain: InMemoryChain) {
    super("http://127.0.0.1:8545", undefined, {
      staticNetwork: ethers.Network.from(chain.chainId),
      batchMaxCount: 1,
      cacheTimeout: -1,
    });
  }

  override async _send(
    payload: ethers.JsonRpcPayload | Array<ethers.JsonRpcPayload>
  ): Promise<Array<ethers.JsonRpcResult>> {
    const batch = Array.isArray(payload) ? payload : [payload];
    return batch.map((request) => ({
      id: request.id,
      result: this.chain.handle(request.method, Array.isArray(request.params) ? request.params : []),
    }));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
