import { Keypair, PublicKey } from "@solana/web3.js";
import { expect } from "chai";
import { CappedToken, TokenError, cappedPreset, type TokenErrorCode } from "@capped-token/sdk";

export function newAccount(): PublicKey {
  return Keypair.generate().publicKey;
}

export function deploy(maxSupply: bigint = BigInt(1000), owner: PublicKey = newAccount()) {
  const token = CappedToken.create(
    cappedPreset({ name: "Test Token", symbol: "TST", decimals: 0, maxSupply }),
    owner
  );
  return { token, owner };
}

/** Run `fn`, assert it throws a TokenError with `code`, and return it. */
export function expectTokenError(fn: () => unknown, code: TokenErrorCode): TokenError {
  try {
    fn();
  } catch (err) {
    expect(err).to.be.instanceOf(TokenError);
    if (err instanceof TokenError) {
      expect(err.code).to.equal(code);
      return err;
    }
  }
  return expect.fail(`Expected a ${code} error`);
}
