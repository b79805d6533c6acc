import { ethers } from "ethers";
import { ChainLink, normalizePoaBlock } from "../chain-link";
import { ConnectionError } from "../errors";
import { FakeRpcProvider, InMemoryChain } from "./helpers/fake-chain";
import { DEST_CONTRACT, silentLogger } from "./helpers/test-kit";
import { DEST_BRIDGE_ABI } from "../abis";

function linkTo(chain: InMemoryChain, chainId = chain.chainId, rpcUrl = "http://127.0.0.1:8545"): ChainLink {
  return new ChainLink(
    { label: "destination", rpcUrl, chainId },
    { logger: silentLogger(), providerFactory: () => new FakeRpcProvider(chain) }
  );
}

describe("ChainLink", () => {
  let link: ChainLink | null = null;

  afterEach(() => {
    link?.disconnect();
    link = null;
  });

  it("should report -1 and not connected before connect()", async () => {
    link = linkTo(new InMemoryChain(80001));

    expect(await link.isConnected()).toBe(false);
    expect(await link.latestBlock()).toBe(-1);
  });

  it("should connect and report the head block", async () => {
    const chain = new InMemoryChain(80001);
    chain.head = 4242;
    link = linkTo(chain);

    await link.connect();

    expect(link.hasSession).toBe(true);
    expect(await link.isConnected()).toBe(true);
    expect(await link.latestBlock()).toBe(4242);
    expect(chain.calls.slice(0, 2)).toEqual(["eth_chainId", "eth_blockNumber"]);
  });

  it("should refuse a node that reports a different chain id", async () => {
    link = linkTo(new InMemoryChain(1), 80001);

    await expect(link.connect()).rejects.toThrow("node reports chain 1, expected 80001");
    expect(await link.isConnected()).toBe(false);
  });

  it("should wrap an unreachable node in ConnectionError without leaking the URL path", async () => {
    const chain = new InMemoryChain(80001);
    chain.down = true;
    link = linkTo(chain, 80001, "http://127.0.0.1:8545/v3/test-secret");

    const failure = link.connect();

    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toThrow(
      "Cannot connect to destination chain at http://127.0.0.1:8545/***: connect ECONNREFUSED 127.0.0.1:8545"
    );
  });

  it("should return -1 instead of throwing once the node goes away", async () => {
    const chain = new InMemoryChain(80001);
    link = linkTo(chain);
    await link.connect();

    chain.down = true;

    expect(await link.latestBlock()).toBe(-1);
    expect(await link.isConnected()).toBe(false);
  });

  it("should refuse to bind a contract while disconnected", () => {
    link = linkTo(new InMemoryChain(80001));

    expect(() => link?.bindContract(DEST_CONTRACT, DEST_BRIDGE_ABI)).toThrow(ConnectionError);
  });

  it("should bind contracts at their checksummed address", async () => {
    link = linkTo(new InMemoryChain(80001));
    await link.connect();

    const contract = link.bindContract(DEST_CONTRACT.toLowerCase(), DEST_BRIDGE_ABI);

    expect(await contract.getAddress()).toBe(ethers.getAddress(DEST_CONTRACT));
  });

  it("should sample the gas price on every call", async () => {
    const chain = new InMemoryChain(80001);
    link = linkTo(chain);
    await link.connect();

    chain.gasPrice = 3_000_000_000n;
    expect(await link.gasPrice()).toBe(3_000_000_000n);
    chain.gasPrice = 5_000_000_000n;
    expect(await link.gasPrice()).toBe(5_000_000_000n);
  });

  it("should drop the session on disconnect()", async () => {
    link = linkTo(new InMemoryChain(80001));
    await link.connect();

    link.disconnect();

    expect(link.hasSession).toBe(false);
    expect(await link.isConnected()).toBe(false);
    expect(await link.latestBlock()).toBe(-1);
  });

  it("should replace the session when reconnecting", async () => {
    const chain = new InMemoryChain(80001);
    let created = 0;
    link = new ChainLink(
      { label: "source", rpcUrl: "http://127.0.0.1:8545", chainId: 80001 },
      {
        logger: silentLogger(),
        providerFactory: () => {
          created++;
          return new FakeRpcProvider(chain);
        },
      }
    );

    await link.connect();
    await link.connect();

    expect(created).toBe(2);
    expect(await link.isConnected()).toBe(true);
  });
});

describe("normalizePoaBlock", () => {
  const sealedExtraData = "0x" + "ab".repeat(97);

  it("should fill header fields PoA chains leave out", () => {
    const block = normalizePoaBlock({ number: "0x10", difficulty: null, extraData: sealedExtraData });

    expect(block).toEqual({
      number: "0x10",
      difficulty: "0x0",
      nonce: "0x0000000000000000",
      mixHash: ethers.ZeroHash,
      extraData: sealedExtraData,
    });
  });

  it("should keep fields the node did send", () => {
    const block = normalizePoaBlock({ difficulty: "0x2", nonce: "0x0000000000000001", mixHash: ethers.id("m") });

    expect(block).toEqual({
      difficulty: "0x2",
      nonce: "0x0000000000000001",
      mixHash: ethers.id("m"),
      extraData: "0x",
    });
  });

  it("should pass through non-object results", () => {
    expect(normalizePoaBlock(null)).toBeNull();
  });
});
