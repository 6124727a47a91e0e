import { formatUnits } from "@capped-token/sdk";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { type GlobalArgs } from "../config";
import { readToken } from "../runner";

export const command = "status";
export const describe = "Display token configuration, supply and holders";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("holders", { type: "number", default: 10, description: "How many top holders to list" });
}

type StatusArgs = GlobalArgs & { holders: number };

export async function handler(argv: ArgumentsCamelCase<StatusArgs>) {
  readToken(argv.db, (token) => {
    const owner = token.owner();
    const holders = token.holders();
    const fmt = (n: bigint) => formatUnits(n, token.decimals);

    console.log(`\n=== ${token.name} (${token.symbol}) ===`);
    console.log(`  Decimals:   ${token.decimals}`);
    console.log(`  Owner:      ${owner ? owner.toBase58() : "(renounced)"}`);
    console.log(`  Paused:     ${token.paused()}`);
    console.log(`  Supply:     ${fmt(token.totalSupply())}`);
    console.log(`  Max supply: ${fmt(token.maxSupply())}`);
    console.log(`  Remaining:  ${fmt(token.maxSupply() - token.totalSupply())}`);
    console.log(`  Holders:    ${holders.length}`);
    for (const h of holders.slice(0, argv.holders)) {
      console.log(`    ${h.account.toBase58()}  ${fmt(h.balance)}`);
    }
  });
}
