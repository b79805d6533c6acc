import { inspect } from "util";
import { ethers } from "ethers";

/**
 * The validator's signing identity.
 *
 * The raw key sits in a runtime-private field, so it never shows up in
 * JSON, util.inspect or a logged config object. A Wallet is built for each
 * signature and dropped afterwards.
 */
export class ValidatorCredential {
  readonly address: string;
  readonly #privateKey: string;

  constructor(privateKey: string) {
    this.#privateKey = privateKey.startsWith("0x") ? privateKey : `0x${privateKey}`;
    this.address = ethers.computeAddress(this.#privateKey);
  }

  async signTransaction(tx: ethers.TransactionRequest): Promise<string> {
    const wallet = new ethers.Wallet(this.#privateKey);
    return wallet.signTransaction({ ...tx, from: this.address });
  }

  toJSON(): { address: string } {
    return { address: this.address };
  }

  [inspect.custom](): string {
    return `ValidatorCredential(${this.address})`;
  }
}
