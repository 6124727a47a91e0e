import * as fs from "fs";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { type GlobalArgs } from "../config";
import { parseBatchFile, parseBatchList, type Batch } from "../batch";
import { runOperation } from "../runner";

export const command = "multisend";
export const describe = "Send tokens to many recipients in one all-or-nothing batch";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("to", { type: "string", description: "Comma-separated recipient public keys" })
    .option("amounts", { type: "string", description: "Comma-separated amounts (base units)" })
    .option("file", { alias: "f", type: "string", description: "CSV file of recipient,amount lines" })
    .conflicts("file", ["to", "amounts"])
    .check((args) => {
      if (args.file === undefined && (args.to === undefined || args.amounts === undefined)) {
        throw new Error("Provide --file, or both --to and --amounts");
      }
      return true;
    });
}

type MultisendArgs = GlobalArgs & { to?: string; amounts?: string; file?: string };

export function readBatch(argv: MultisendArgs): Batch {
  if (argv.file !== undefined) {
    return parseBatchFile(fs.readFileSync(argv.file, "utf-8"));
  }
  return parseBatchList(argv.to ?? "", argv.amounts ?? "");
}

export async function handler(argv: ArgumentsCamelCase<MultisendArgs>) {
  const { recipients, amounts } = readBatch(argv);
  const total = amounts.reduce((sum, a) => sum + a, BigInt(0));

  const token = runOperation(argv, "multisend", (t, signer) => {
    t.multisend(signer.publicKey, recipients, amounts);
    return { amount: total.toString(), target: `${recipients.length} recipients` };
  });

  console.log(`\nBatch sent!`);
  recipients.forEach((recipient, i) => {
    console.log(`  ${recipient.toBase58()}  ${amounts[i].toString()}`);
  });
  console.log(`  Total:      ${total.toString()}`);
  console.log(`  Recipients: ${recipients.length}`);
  console.log(`  Holders:    ${token.holders().length}`);
}
