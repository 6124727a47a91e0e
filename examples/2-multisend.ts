/**
 * Example 2: Pay several recipients in one all-or-nothing batch
 *
 * Run: npx tsx examples/2-multisend.ts
 */

import { Keypair } from "@solana/web3.js";
import { CappedToken, cappedPreset, isTokenError } from "@capped-token/sdk";

function main() {
  const owner = Keypair.generate().publicKey;
  const payees = [1, 2, 3].map(() => Keypair.generate().publicKey);

  const token = CappedToken.create(cappedPreset({ decimals: 0, maxSupply: BigInt(10_000) }), owner);
  token.mint(owner, owner, BigInt(1_000));

  token.multisend(owner, payees, [BigInt(100), BigInt(200), BigInt(300)]);
  payees.forEach((p) => console.log(`${p.toBase58()}: ${token.balanceOf(p).toString()}`));
  console.log(`Owner keeps ${token.balanceOf(owner).toString()}`);

  // 500 is more than the owner has left, so nobody is paid
  try {
    token.multisend(owner, payees, [BigInt(100), BigInt(100), BigInt(300)]);
  } catch (err) {
    if (!isTokenError(err, "InsufficientBalance")) throw err;
    console.log(`Batch rejected: ${err.message}`);
  }

  // Paused transfers block the batch too
  token.pause(owner);
  try {
    token.multisend(owner, payees.slice(0, 1), [BigInt(1)]);
  } catch (err) {
    if (!isTokenError(err, "TransfersPaused")) throw err;
    console.log(`Batch rejected: ${err.message}`);
  }
  token.unpause(owner);
}

main();
