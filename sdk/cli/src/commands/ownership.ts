import type { ArgumentsCamelCase, Argv } from "yargs";
import { parsePublicKey, type GlobalArgs } from "../config";
import { runOperation } from "../runner";

export const command = "ownership";
export const describe = "Transfer or renounce token ownership (owner only)";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("to", { type: "string", description: "New owner public key" })
    .option("renounce", { type: "boolean", default: false, description: "Give up ownership for good" })
    .conflicts("to", "renounce")
    .check((args) => {
      if (args.to === undefined && !args.renounce) {
        throw new Error("Provide --to <new owner> or --renounce");
      }
      return true;
    });
}

type OwnershipArgs = GlobalArgs & { to?: string; renounce: boolean };

export async function handler(argv: ArgumentsCamelCase<OwnershipArgs>) {
  const newOwner = argv.to !== undefined ? parsePublicKey(argv.to, "new owner") : undefined;

  runOperation(argv, newOwner ? "transferOwnership" : "renounceOwnership", (t, signer) => {
    if (newOwner) {
      t.transferOwnership(signer.publicKey, newOwner);
      return { target: newOwner.toBase58() };
    }
    t.renounceOwnership(signer.publicKey);
    return {};
  });

  console.log(newOwner ? `\nOwnership transferred to ${newOwner.toBase58()}` : `\nOwnership renounced`);
}
