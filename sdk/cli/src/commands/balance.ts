import { formatUnits } from "@capped-token/sdk";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { loadKeypair, parsePublicKey, type GlobalArgs } from "../config";
import { readToken } from "../runner";

export const command = "balance";
export const describe = "Show an account's balance (defaults to the keypair's)";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("account", { alias: "a", type: "string", description: "Account public key" });
}

type BalanceArgs = GlobalArgs & { account?: string };

export async function handler(argv: ArgumentsCamelCase<BalanceArgs>) {
  const account =
    argv.account !== undefined ? parsePublicKey(argv.account, "account") : loadKeypair(argv.keypair).publicKey;

  readToken(argv.db, (token) => {
    const balance = token.balanceOf(account);
    console.log(`\n${account.toBase58()}`);
    console.log(`  Balance: ${formatUnits(balance, token.decimals)} ${token.symbol} (${balance.toString()} base units)`);
  });
}
