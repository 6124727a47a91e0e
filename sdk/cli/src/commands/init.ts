import { CappedToken, TokenStore, cappedPreset, formatUnits } from "@capped-token/sdk";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { loadKeypair, parseAmount, type GlobalArgs } from "../config";

export const command = "init";
export const describe = "Deploy a new capped token into the database";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("name", { type: "string", demandOption: true, description: "Token name" })
    .option("symbol", { type: "string", demandOption: true, description: "Token symbol" })
    .option("decimals", { type: "number", default: 18, description: "Token decimals" })
    .option("max-supply", { type: "string", demandOption: true, description: "Supply ceiling (base units)" });
}

type InitArgs = GlobalArgs & { name: string; symbol: string; decimals: number; maxSupply: string };

export async function handler(argv: ArgumentsCamelCase<InitArgs>) {
  const deployer = loadKeypair(argv.keypair);
  const config = cappedPreset({
    name: argv.name,
    symbol: argv.symbol,
    decimals: argv.decimals,
    maxSupply: parseAmount(argv.maxSupply, "max supply"),
  });

  const store = new TokenStore(argv.db);
  try {
    if (store.exists()) {
      throw new Error(`A token already exists in ${argv.db}`);
    }
    const token = CappedToken.create(config, deployer.publicKey);
    store.save(token);
    store.recordOperation({
      operation: "init",
      actor: deployer.publicKey.toBase58(),
      amount: config.maxSupply.toString(),
    });

    console.log(`\nToken deployed!`);
    console.log(`  Name:       ${token.name} (${token.symbol})`);
    console.log(`  Decimals:   ${token.decimals}`);
    console.log(`  Max supply: ${formatUnits(token.maxSupply(), token.decimals)}`);
    console.log(`  Owner:      ${deployer.publicKey.toBase58()}`);
    console.log(`  Database:   ${argv.db}`);
  } finally {
    store.close();
  }
}
