import type { ArgumentsCamelCase, Argv } from "yargs";
import { parseAmount, parsePublicKey, type GlobalArgs } from "../config";
import { runOperation } from "../runner";

export const command = "approve";
export const describe = "Set a spender's allowance over your tokens";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("spender", { type: "string", demandOption: true, description: "Spender public key" })
    .option("amount", { type: "string", demandOption: true, description: "Allowance (base units)" });
}

type ApproveArgs = GlobalArgs & { spender: string; amount: string };

export async function handler(argv: ArgumentsCamelCase<ApproveArgs>) {
  const spender = parsePublicKey(argv.spender, "spender");
  const amount = parseAmount(argv.amount);

  runOperation(argv, "approve", (t, signer) => {
    t.approve(signer.publicKey, spender, amount);
    return { amount: amount.toString(), target: spender.toBase58() };
  });

  console.log(`\nAllowance set!`);
  console.log(`  Spender: ${spender.toBase58()}`);
  console.log(`  Amount:  ${amount.toString()}`);
}
