import { CappedToken, TokenStore, isTokenError } from "@capped-token/sdk";
import type { Keypair } from "@solana/web3.js";
import { loadKeypair, type GlobalArgs } from "./config";

export interface OperationSummary {
  amount?: string;
  target?: string;
}

function missingToken(dbPath: string): Error {
  return new Error(`No token found in ${dbPath}. Run \`capped-token init\` first.`);
}

/** Open the store read-only style: load, hand over, close. */
export function readToken<T>(dbPath: string, read: (token: CappedToken, store: TokenStore) => T): T {
  const store = new TokenStore(dbPath);
  try {
    const token = store.load();
    if (!token) throw missingToken(dbPath);
    return read(token, store);
  } finally {
    store.close();
  }
}

/**
 * Load the token, apply one signed operation and persist the result.
 * Rejected operations are logged with status "failed" and rethrown; the
 * stored token state is left as it was.
 */
export function runOperation(
  argv: GlobalArgs,
  operation: string,
  apply: (token: CappedToken, signer: Keypair) => OperationSummary
): CappedToken {
  const signer = loadKeypair(argv.keypair);
  const actor = signer.publicKey.toBase58();
  const store = new TokenStore(argv.db);

  try {
    const token = store.load();
    if (!token) throw missingToken(argv.db);

    let summary: OperationSummary;
    try {
      summary = apply(token, signer);
    } catch (err) {
      if (isTokenError(err)) {
        store.recordOperation({ operation, actor, status: "failed" });
      }
      throw err;
    }

    store.save(token);
    store.recordOperation({ operation, actor, ...summary });
    return token;
  } finally {
    store.close();
  }
}

export function reportError(err: unknown): void {
  if (isTokenError(err)) {
    console.error(`Error [${err.code}]: ${err.message}`);
  } else if (err instanceof Error) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("Error:", err);
  }
  process.exitCode = 1;
}
