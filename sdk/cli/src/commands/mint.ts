import type { ArgumentsCamelCase, Argv } from "yargs";
import { parseAmount, parsePublicKey, type GlobalArgs } from "../config";
import { runOperation } from "../runner";

export const command = "mint";
export const describe = "Mint tokens to a recipient (owner only)";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("to", { type: "string", demandOption: true, description: "Recipient public key" })
    .option("amount", { type: "string", demandOption: true, description: "Amount (base units)" });
}

type MintArgs = GlobalArgs & { to: string; amount: string };

export async function handler(argv: ArgumentsCamelCase<MintArgs>) {
  const recipient = parsePublicKey(argv.to, "recipient");
  const amount = parseAmount(argv.amount);

  const token = runOperation(argv, "mint", (t, signer) => {
    t.mint(signer.publicKey, recipient, amount);
    return { amount: amount.toString(), target: recipient.toBase58() };
  });

  console.log(`\nTokens minted!`);
  console.log(`  Amount:       ${amount.toString()}`);
  console.log(`  To:           ${recipient.toBase58()}`);
  console.log(`  Total supply: ${token.totalSupply().toString()} / ${token.maxSupply().toString()}`);
}
