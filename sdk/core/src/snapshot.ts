import { PublicKey } from "@solana/web3.js";
import type { TokenEvent, TokenState } from "./types";
import { TokenError } from "./errors";

// ── JSON shapes ─────────────────────────────────────────────────────

export interface SerializedTokenState {
  config: { name: string; symbol: string; decimals: number; maxSupply: string };
  owner: string | null;
  paused: boolean;
  totalSupply: string;
  balances: Array<[string, string]>;
  allowances: Array<{ owner: string; spender: string; amount: string }>;
}

/** Event payload with keys as base58 and amounts as decimal strings. */
export type SerializedEventFields = Record<string, string | null>;

// ── Encoding ────────────────────────────────────────────────────────

export function serializeState(state: TokenState): SerializedTokenState {
  return {
    config: {
      name: state.config.name,
      symbol: state.config.symbol,
      decimals: state.config.decimals,
      maxSupply: state.config.maxSupply.toString(),
    },
    owner: state.owner ? state.owner.toBase58() : null,
    paused: state.paused,
    totalSupply: state.totalSupply.toString(),
    balances: state.balances.map(([account, balance]) => [account.toBase58(), balance.toString()]),
    allowances: state.allowances.map((a) => ({
      owner: a.owner.toBase58(),
      spender: a.spender.toBase58(),
      amount: a.amount.toString(),
    })),
  };
}

export function serializeEvent(event: TokenEvent): SerializedEventFields {
  switch (event.type) {
    case "Transfer":
      return { from: event.from.toBase58(), to: event.to.toBase58(), amount: event.amount.toString() };
    case "Approval":
      return {
        owner: event.owner.toBase58(),
        spender: event.spender.toBase58(),
        amount: event.amount.toString(),
      };
    case "Paused":
    case "Unpaused":
      return { account: event.account.toBase58() };
    case "OwnershipTransferred":
      return {
        previousOwner: event.previousOwner ? event.previousOwner.toBase58() : null,
        newOwner: event.newOwner ? event.newOwner.toBase58() : null,
      };
  }
}

// ── Decoding ────────────────────────────────────────────────────────

function corrupt(reason: string): TokenError {
  return new TokenError("CorruptSnapshot", `Corrupt snapshot: ${reason}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== "string") throw corrupt(`${key} must be a string`);
  return value;
}

function readKey(value: unknown, label: string): PublicKey {
  if (typeof value !== "string") throw corrupt(`${label} must be a base58 string`);
  try {
    return new PublicKey(value);
  } catch {
    throw corrupt(`${label} is not a valid public key`);
  }
}

function readAmount(value: unknown, label: string): bigint {
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw corrupt(`${label} must be a decimal string`);
  }
  return BigInt(value);
}

/**
 * Check that a state could have been produced by the token: supply within
 * the ceiling, balances summing to the supply, no account listed twice.
 */
export function assertConsistentState(state: TokenState): void {
  if (state.totalSupply > state.config.maxSupply) {
    throw corrupt("totalSupply exceeds maxSupply");
  }

  const seen = new Set<string>();
  let sum = BigInt(0);
  for (const [account, balance] of state.balances) {
    const key = account.toBase58();
    if (seen.has(key)) throw corrupt(`balance for ${key} listed twice`);
    seen.add(key);
    sum += balance;
  }
  if (sum !== state.totalSupply) {
    throw corrupt("balances do not add up to totalSupply");
  }
}

/** Parse and validate the JSON text written by the store. */
export function deserializeState(json: string): TokenState {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw corrupt("not valid JSON");
  }
  if (!isRecord(raw)) throw corrupt("expected an object");

  const config = raw.config;
  if (!isRecord(config)) throw corrupt("config missing");
  const decimals = config.decimals;
  const paused = raw.paused;
  if (typeof decimals !== "number") throw corrupt("decimals must be a number");
  if (typeof paused !== "boolean") throw corrupt("paused must be a boolean");

  const balances = raw.balances;
  const allowances = raw.allowances;
  if (!Array.isArray(balances)) throw corrupt("balances must be an array");
  if (!Array.isArray(allowances)) throw corrupt("allowances must be an array");

  const state: TokenState = {
    config: {
      name: readString(config, "name"),
      symbol: readString(config, "symbol"),
      decimals,
      maxSupply: readAmount(config.maxSupply, "maxSupply"),
    },
    owner: raw.owner === null ? null : readKey(raw.owner, "owner"),
    paused,
    totalSupply: readAmount(raw.totalSupply, "totalSupply"),
    balances: balances.map((entry: unknown, i): [PublicKey, bigint] => {
      if (!Array.isArray(entry) || entry.length !== 2) throw corrupt(`balances[${i}] must be a pair`);
      return [readKey(entry[0], `balances[${i}]`), readAmount(entry[1], `balances[${i}]`)];
    }),
    allowances: allowances.map((entry: unknown, i) => {
      if (!isRecord(entry)) throw corrupt(`allowances[${i}] must be an object`);
      return {
        owner: readKey(entry.owner, `allowances[${i}].owner`),
        spender: readKey(entry.spender, `allowances[${i}].spender`),
        amount: readAmount(entry.amount, `allowances[${i}].amount`),
      };
    }),
  };
  assertConsistentState(state);
  return state;
}
