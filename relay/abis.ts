import type { ethers } from "ethers";

export const DEFAULT_EVENT_NAME = "TokensLocked";
export const MINT_FUNCTION = "mint";
export const PROCESSED_NONCES_FUNCTION = "processedNonces";

/** Source-chain bridge: emits one TokensLocked per deposit. */
export const SOURCE_BRIDGE_ABI: ReadonlyArray<ethers.JsonFragment> = [
  {
    type: "event",
    name: "TokensLocked",
    anonymous: false,
    inputs: [
      { name: "from", type: "address", indexed: true },
      { name: "to", type: "address", indexed: true },
      { name: "amount", type: "uint256", indexed: false },
      { name: "nonce", type: "uint256", indexed: false },
    ],
  },
];

/** Destination-chain bridge: validator-only mint guarded by processedNonces. */
export const DEST_BRIDGE_ABI: ReadonlyArray<ethers.JsonFragment> = [
  {
    type: "function",
    name: "mint",
    stateMutability: "nonpayable",
    inputs: [
      { name: "to", type: "address" },
      { name: "amount", type: "uint256" },
      { name: "sourceNonce", type: "uint256" },
    ],
    outputs: [],
  },
  {
    type: "function",
    name: "processedNonces",
    stateMutability: "view",
    inputs: [{ name: "", type: "uint256" }],
    outputs: [{ name: "", type: "bool" }],
  },
];
