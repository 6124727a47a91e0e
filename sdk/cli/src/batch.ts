import type { PublicKey } from "@solana/web3.js";
import { parseAmount, parsePublicKey } from "./config";

export interface Batch {
  recipients: PublicKey[];
  amounts: bigint[];
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parse `--to a,b --amounts 1,2`. Lengths are not compared here; the token
 * rejects a mismatched batch as a whole.
 */
export function parseBatchList(to: string, amounts: string): Batch {
  return {
    recipients: splitList(to).map((r, i) => parsePublicKey(r, `recipient #${i + 1}`)),
    amounts: splitList(amounts).map((a, i) => parseAmount(a, `amount #${i + 1}`)),
  };
}

/**
 * Parse a CSV of `recipient,amount` lines. Blank lines, `#` comments and a
 * leading `recipient,amount` header are skipped.
 */
export function parseBatchFile(contents: string): Batch {
  const batch: Batch = { recipients: [], amounts: [] };
  const lines = contents.split(/\r?\n/);

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) return;
    if (batch.recipients.length === 0 && /^recipient\s*,\s*amount$/i.test(trimmed)) return;

    const cells = trimmed.split(",").map((c) => c.trim());
    if (cells.length !== 2) {
      throw new Error(`Line ${index + 1}: expected "recipient,amount"`);
    }
    batch.recipients.push(parsePublicKey(cells[0], `recipient on line ${index + 1}`));
    batch.amounts.push(parseAmount(cells[1], `amount on line ${index + 1}`));
  });

  return batch;
}
