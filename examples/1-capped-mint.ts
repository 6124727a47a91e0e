/**
 * Example 1: Deploy a capped token and mint up to its ceiling
 *
 * Run: npm run example
 */

import { Keypair } from "@solana/web3.js";
import { CappedToken, cappedPreset, formatUnits, isTokenError, toBaseUnits } from "@capped-token/sdk";

function main() {
  const owner = Keypair.generate().publicKey;
  const treasury = Keypair.generate().publicKey;

  // 6 decimals, ceiling of 1,000 whole tokens
  const token = CappedToken.create(
    cappedPreset({ name: "Community Points", symbol: "PTS", decimals: 6, maxSupply: toBaseUnits("1000", 6) }),
    owner
  );
  console.log(`Deployed ${token.name} (${token.symbol}), owner ${owner.toBase58()}`);

  token.mint(owner, treasury, toBaseUnits("750", 6));
  token.mint(owner, treasury, toBaseUnits("250", 6));
  console.log(`Supply: ${formatUnits(token.totalSupply(), token.decimals)} / ${formatUnits(token.maxSupply(), token.decimals)}`);

  // The ceiling is reached; one more base unit is refused
  try {
    token.mint(owner, treasury, BigInt(1));
  } catch (err) {
    if (!isTokenError(err, "SupplyExceeded")) throw err;
    console.log(`Refused: ${err.message}`);
  }

  for (const event of token.events()) {
    console.log(`  ${event.type}`);
  }
}

main();
