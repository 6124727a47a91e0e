import type { ArgumentsCamelCase, Argv } from "yargs";
import { parseAmount, parsePublicKey, type GlobalArgs } from "../config";
import { runOperation } from "../runner";

export const command = "transfer";
export const describe = "Transfer tokens, or spend an allowance with --from";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("to", { type: "string", demandOption: true, description: "Recipient public key" })
    .option("amount", { type: "string", demandOption: true, description: "Amount (base units)" })
    .option("from", { type: "string", description: "Owner whose allowance to spend" });
}

type TransferArgs = GlobalArgs & { to: string; amount: string; from?: string };

export async function handler(argv: ArgumentsCamelCase<TransferArgs>) {
  const recipient = parsePublicKey(argv.to, "recipient");
  const amount = parseAmount(argv.amount);
  const from = argv.from !== undefined ? parsePublicKey(argv.from, "owner") : undefined;

  runOperation(argv, from ? "transferFrom" : "transfer", (t, signer) => {
    if (from) {
      t.transferFrom(signer.publicKey, from, recipient, amount);
    } else {
      t.transfer(signer.publicKey, recipient, amount);
    }
    return { amount: amount.toString(), target: recipient.toBase58() };
  });

  console.log(`\nTransfer complete!`);
  if (from) console.log(`  From:   ${from.toBase58()}`);
  console.log(`  To:     ${recipient.toBase58()}`);
  console.log(`  Amount: ${amount.toString()}`);
}
