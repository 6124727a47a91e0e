import { Keypair, PublicKey } from "@solana/web3.js";
import * as fs from "fs";
import * as path from "path";

const DEFAULT_KEYPAIR_PATH = path.join(
  process.env.HOME || "~",
  ".config",
  "solana",
  "id.json"
);

const DEFAULT_DB_PATH =
  process.env.CAPPED_TOKEN_DB || path.join(process.cwd(), "data", "token.sqlite");

export interface GlobalArgs {
  keypair: string;
  db: string;
}

export function loadKeypair(keypairPath?: string): Keypair {
  const resolved = keypairPath || DEFAULT_KEYPAIR_PATH;
  const expanded = resolved.replace(/^~/, process.env.HOME || "~");
  const raw: unknown = JSON.parse(fs.readFileSync(expanded, "utf-8"));
  if (!Array.isArray(raw) || !raw.every((b) => Number.isInteger(b) && b >= 0 && b <= 255)) {
    throw new Error(`Keypair file ${expanded} must hold a JSON array of bytes`);
  }
  return Keypair.fromSecretKey(Uint8Array.from(raw));
}

export function parsePublicKey(value: string, label = "address"): PublicKey {
  try {
    return new PublicKey(value.trim());
  } catch {
    throw new Error(`Invalid ${label}: ${value}`);
  }
}

export function parseAmount(value: string, label = "amount"): bigint {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${label}: ${value} (expected base units)`);
  }
  return BigInt(trimmed);
}

export const globalOptions = {
  keypair: { alias: "k" as const, type: "string" as const, description: "Path to keypair file", default: DEFAULT_KEYPAIR_PATH },
  db: { alias: "d" as const, type: "string" as const, description: "Path to the token database", default: DEFAULT_DB_PATH },
};
