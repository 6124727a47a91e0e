import { PublicKey } from "@solana/web3.js";

// ── Constants ────────────────────────────────────────────────────────

/** The null account: never a valid sender, recipient or owner. */
export const ZERO_ACCOUNT = PublicKey.default;

export const MAX_UINT256 = (BigInt(1) << BigInt(256)) - BigInt(1);

export const DEFAULT_DECIMALS = 18;

// ── Configuration ───────────────────────────────────────────────────

export interface TokenConfig {
  name: string;
  symbol: string;
  decimals: number;
  maxSupply: bigint;
}

// ── Collaborator surfaces ───────────────────────────────────────────

export type Authorization =
  | { ok: true; owner: PublicKey }
  | { ok: false; reason: string };

export interface TransferPlanEntry {
  to: PublicKey;
  amount: bigint;
}

// ── Event Types ─────────────────────────────────────────────────────

export type TokenEvent =
  | { type: "Transfer"; from: PublicKey; to: PublicKey; amount: bigint }
  | { type: "Approval"; owner: PublicKey; spender: PublicKey; amount: bigint }
  | { type: "Paused"; account: PublicKey }
  | { type: "Unpaused"; account: PublicKey }
  | { type: "OwnershipTransferred"; previousOwner: PublicKey | null; newOwner: PublicKey | null };

export type TokenEventType = TokenEvent["type"];

export const TOKEN_EVENT_TYPES: readonly TokenEventType[] = [
  "Transfer",
  "Approval",
  "Paused",
  "Unpaused",
  "OwnershipTransferred",
];

// ── Snapshot ────────────────────────────────────────────────────────

export interface TokenState {
  config: TokenConfig;
  owner: PublicKey | null;
  paused: boolean;
  totalSupply: bigint;
  balances: Array<[PublicKey, bigint]>;
  allowances: Array<{ owner: PublicKey; spender: PublicKey; amount: bigint }>;
}

export interface Holder {
  account: PublicKey;
  balance: bigint;
}
