import { ethers } from "ethers";
import { DEST_BRIDGE_ABI } from "../abis";
import { ChainLink } from "../chain-link";
import { ValidatorCredential } from "../credential";
import { DestinationUnavailable, MalformedEvent, SubmissionError } from "../errors";
import type { RelayMetrics } from "../metrics";
import { RelayExecutor } from "../relay-executor";
import { FakeRpcProvider, InMemoryChain } from "./helpers/fake-chain";
import { BOB, DEST_CONTRACT, VALIDATOR_KEY, makeEvent, silentLogger, testMetrics } from "./helpers/test-kit";

const destInterface = new ethers.Interface(DEST_BRIDGE_ABI);

describe("RelayExecutor", () => {
  let chain: InMemoryChain;
  let link: ChainLink;
  let credential: ValidatorCredential;
  let metrics: RelayMetrics;

  beforeEach(async () => {
    chain = new InMemoryChain(80001, destInterface);
    link = new ChainLink(
      { label: "destination", rpcUrl: "http://127.0.0.1:8545", chainId: 80001 },
      { logger: silentLogger(), providerFactory: () => new FakeRpcProvider(chain) }
    );
    await link.connect();
    credential = new ValidatorCredential(VALIDATOR_KEY);
    metrics = testMetrics();
  });

  afterEach(() => {
    link.disconnect();
  });

  function executor(): RelayExecutor {
    return new RelayExecutor(
      link,
      credential,
      { contractAddress: DEST_CONTRACT, contractInterface: destInterface },
      silentLogger(),
      metrics
    );
  }

  async function relayCount(status: string): Promise<number> {
    const { values } = await metrics.relaysTotal.get();
    return values.find((v) => v.labels.status === status)?.value ?? 0;
  }

  it("should sign and broadcast mint(recipient, amount, nonce) from the event", async () => {
    const outcome = await executor().relay(makeEvent());

    expect(chain.submitted).toHaveLength(1);
    const [tx] = chain.submitted;
    expect(tx.type).toBe(0);
    expect(tx.chainId).toBe(80001n);
    expect(tx.to).toBe(ethers.getAddress(DEST_CONTRACT));
    expect(tx.from).toBe(credential.address);
    expect(tx.gasLimit).toBe(200_000n);
    expect(tx.gasPrice).toBe(1_000_000_000n);
    expect(tx.nonce).toBe(0);
    expect(tx.value).toBe(0n);

    const [recipient, amount, sourceNonce] = destInterface.decodeFunctionData("mint", tx.data);
    expect(recipient).toBe(BOB);
    expect(amount).toBe(2n * 10n ** 16n);
    expect(sourceNonce).toBe(2n);

    expect(outcome).toEqual({
      status: "submitted",
      txHash: tx.hash,
      request: { recipient: BOB, amount: 2n * 10n ** 16n, sourceNonce: 2n },
    });
    expect(await relayCount("submitted")).toBe(1);
  });

  it("should use the gas price sampled at relay time", async () => {
    chain.gasPrice = 7_000_000_000n;

    await executor().relay(makeEvent());

    expect(chain.submitted[0].gasPrice).toBe(7_000_000_000n);
  });

  it("should honour a configured gas limit", async () => {
    const custom = new RelayExecutor(
      link,
      credential,
      { contractAddress: DEST_CONTRACT, contractInterface: destInterface, gasLimit: 350_000n },
      silentLogger(),
      metrics
    );

    await custom.relay(makeEvent());

    expect(chain.submitted[0].gasLimit).toBe(350_000n);
  });

  it("should not resubmit a nonce this process already broadcast", async () => {
    const relayer = executor();
    await relayer.relay(makeEvent());

    const second = await relayer.relay(makeEvent({ logIndex: 5 }));

    expect(second).toEqual({ status: "recently-submitted", nonce: 2n });
    expect(chain.submitted).toHaveLength(1);
    expect(await relayCount("recently_submitted")).toBe(1);
  });

  it("should skip a nonce the destination contract already processed", async () => {
    chain.processedNonces.add(2n);

    const outcome = await executor().relay(makeEvent());

    expect(outcome).toEqual({ status: "already-processed", nonce: 2n });
    expect(chain.submitted).toHaveLength(0);
    expect(chain.calls).not.toContain("eth_sendRawTransaction");
  });

  it("should see a mint submitted by an earlier process through processedNonces", async () => {
    await executor().relay(makeEvent());

    const restarted = await executor().relay(makeEvent());

    expect(restarted).toEqual({ status: "already-processed", nonce: 2n });
    expect(chain.submitted).toHaveLength(1);
  });

  it("should raise DestinationUnavailable and submit nothing while the destination is down", async () => {
    chain.down = true;
    const relayer = executor();

    await expect(relayer.relay(makeEvent())).rejects.toBeInstanceOf(DestinationUnavailable);
    expect(chain.submitted).toHaveLength(0);

    chain.down = false;
    const outcome = await relayer.relay(makeEvent());
    expect(outcome.status).toBe("submitted");
  });

  it("should raise SubmissionError carrying the nonce when the broadcast is refused", async () => {
    chain.sendRawError = new Error("nonce too low");
    const relayer = executor();

    const failure = relayer.relay(makeEvent());

    await expect(failure).rejects.toBeInstanceOf(SubmissionError);
    await expect(failure).rejects.toMatchObject({ nonce: 2n });
    await expect(failure).rejects.toThrow(/^Mint for nonce 2 was not submitted: .*nonce too low/);
    expect(await relayCount("submission_error")).toBe(1);
  });

  it("should allow the same nonce again after a failed submission", async () => {
    chain.sendRawError = new Error("replacement transaction underpriced");
    const relayer = executor();
    await expect(relayer.relay(makeEvent())).rejects.toBeInstanceOf(SubmissionError);

    const outcome = await relayer.relay(makeEvent());

    expect(outcome.status).toBe("submitted");
    expect(chain.submitted).toHaveLength(1);
  });

  it("should reject an incomplete event before touching the destination", async () => {
    const callsBefore = chain.calls.length;

    await expect(executor().relay(makeEvent({ amount: undefined }))).rejects.toBeInstanceOf(MalformedEvent);
    expect(chain.calls).toHaveLength(callsBefore);
  });

  it("should take the next account nonce for each mint", async () => {
    const relayer = executor();

    await relayer.relay(makeEvent({ nonce: 2n }));
    await relayer.relay(makeEvent({ nonce: 3n, logIndex: 1 }));

    expect(chain.submitted.map((tx) => tx.nonce)).toEqual([0, 1]);
  });
});
