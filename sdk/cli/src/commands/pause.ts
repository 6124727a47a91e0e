import type { ArgumentsCamelCase, Argv } from "yargs";
import { type GlobalArgs } from "../config";
import { runOperation } from "../runner";

export const command = "pause";
export const describe = "Pause or unpause token transfers (owner only)";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("unpause", { type: "boolean", default: false, description: "Unpause instead of pause" });
}

type PauseArgs = GlobalArgs & { unpause: boolean };

export async function handler(argv: ArgumentsCamelCase<PauseArgs>) {
  const isUnpause = argv.unpause;

  runOperation(argv, isUnpause ? "unpause" : "pause", (t, signer) => {
    if (isUnpause) {
      t.unpause(signer.publicKey);
    } else {
      t.pause(signer.publicKey);
    }
    return {};
  });

  console.log(`\nTransfers ${isUnpause ? "unpaused" : "paused"}!`);
}
