import { ethers } from "ethers";
import type { Logger } from "winston";
import type { ChainLink } from "./chain-link";
import { ConnectionError, describeError } from "./errors";
import type { BridgeEvent } from "./types";

/** Where a freshly opened filter starts reading. */
export type FilterAnchor = { readonly kind: "latest" } | { readonly kind: "block"; readonly fromBlock: number };

export interface EventFilter {
  /** First block not yet fetched. */
  readonly nextBlock: number;
  /** Entries since the previous call, in block then log-index order. */
  getNewEntries(): Promise<BridgeEvent[]>;
}

export interface EventSource {
  openFilter(anchor: FilterAnchor): Promise<EventFilter>;
}

export interface ContractEventSourceOptions {
  contractAddress: string;
  contractInterface: ethers.Interface;
  eventName: string;
  /** Upper bound on blocks covered by one eth_getLogs call. */
  maxBlockRange?: number;
}

/** Maps decoded event argument names onto BridgeEvent fields. */
const FIELD_ARGUMENTS = {
  fromAddress: "from",
  toAddress: "to",
  amount: "amount",
  nonce: "nonce",
} as const;

/**
 * Reads the bridge contract's lock events from the source chain through
 * block-range log queries.
 */
export class ContractEventSource implements EventSource {
  private readonly logger: Logger;
  private readonly fragment: ethers.EventFragment;
  /** Blocks per eth_getLogs call; halves whenever a ranged query fails and stays narrowed. */
  private blockSpan: number;

  constructor(
    private readonly link: ChainLink,
    private readonly options: ContractEventSourceOptions,
    logger: Logger
  ) {
    const fragment = options.contractInterface.getEvent(options.eventName);
    if (!fragment) {
      throw new Error(`ABI has no event named ${options.eventName}`);
    }
    this.fragment = fragment;
    this.blockSpan = options.maxBlockRange ?? 2_000;
    this.logger = logger.child({ component: "EventSource" });
  }

  async openFilter(anchor: FilterAnchor): Promise<EventFilter> {
    let fromBlock: number;
    if (anchor.kind === "latest") {
      const head = await this.link.latestBlock();
      if (head < 0) {
        throw new ConnectionError("Source chain unavailable while opening event filter");
      }
      fromBlock = head + 1;
    } else {
      fromBlock = anchor.fromBlock;
    }
    this.logger.info(`Watching ${this.options.eventName} from block ${fromBlock}`);
    return new BlockRangeFilter(this, fromBlock);
  }

  get currentBlockSpan(): number {
    return this.blockSpan;
  }

  /** @internal used by BlockRangeFilter */
  async fetchRange(fromBlock: number): Promise<{ events: BridgeEvent[]; nextBlock: number }> {
    const head = await this.link.latestBlock();
    if (head < 0) {
      throw new ConnectionError("Source chain unavailable while polling");
    }
    if (head < fromBlock) {
      return { events: [], nextBlock: fromBlock };
    }
    const toBlock = Math.min(head, fromBlock + this.blockSpan - 1);
    let logs: ethers.Log[];
    try {
      logs = await this.link.getLogs({
        address: ethers.getAddress(this.options.contractAddress),
        topics: [this.fragment.topicHash],
        fromBlock,
        toBlock,
      });
    } catch (err) {
      if (toBlock > fromBlock) {
        this.blockSpan = Math.max(1, Math.floor((toBlock - fromBlock + 1) / 2));
        this.logger.warn(
          `eth_getLogs ${fromBlock}-${toBlock} failed, next query spans ${this.blockSpan} block(s): ${describeError(err)}`
        );
      }
      throw err;
    }
    const events = [...logs]
      .sort((a, b) => a.blockNumber - b.blockNumber || a.index - b.index)
      .map((log) => this.toBridgeEvent(log));
    return { events, nextBlock: toBlock + 1 };
  }

  /**
   * Entries that cannot be decoded keep only their location; the
   * completeness rule rejects them downstream.
   */
  toBridgeEvent(log: ethers.Log): BridgeEvent {
    const location = {
      sourceChainId: this.link.endpoint.chainId,
      sourceTxHash: log.transactionHash,
      blockNumber: log.blockNumber,
      logIndex: log.index,
    };

    let args: Map<string, unknown>;
    try {
      args = this.decodeArguments(log);
    } catch (err) {
      this.logger.warn(`Undecodable log ${log.transactionHash}:${log.index}: ${describeError(err)}`);
      return Object.freeze(location);
    }

    const from = args.get(FIELD_ARGUMENTS.fromAddress);
    const to = args.get(FIELD_ARGUMENTS.toAddress);
    const amount = args.get(FIELD_ARGUMENTS.amount);
    const nonce = args.get(FIELD_ARGUMENTS.nonce);
    return Object.freeze({
      ...location,
      ...(typeof from === "string" ? { fromAddress: from } : {}),
      ...(typeof to === "string" ? { toAddress: to } : {}),
      ...(typeof amount === "bigint" ? { amount } : {}),
      ...(typeof nonce === "bigint" ? { nonce } : {}),
    });
  }

  private decodeArguments(log: ethers.Log): Map<string, unknown> {
    const description = this.options.contractInterface.parseLog({ topics: [...log.topics], data: log.data });
    if (!description) {
      throw new Error("topic does not match the configured ABI");
    }
    const args = new Map<string, unknown>();
    description.fragment.inputs.forEach((input, i) => {
      if (input.name) {
        const value: unknown = description.args[i];
        args.set(input.name, value);
      }
    });
    return args;
  }
}

class BlockRangeFilter implements EventFilter {
  constructor(
    private readonly source: ContractEventSource,
    private cursor: number
  ) {}

  get nextBlock(): number {
    return this.cursor;
  }

  async getNewEntries(): Promise<BridgeEvent[]> {
    const { events, nextBlock } = await this.source.fetchRange(this.cursor);
    this.cursor = nextBlock;
    return events;
  }
}
