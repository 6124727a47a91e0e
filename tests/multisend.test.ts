import { expect } from "chai";
import { PublicKey } from "@solana/web3.js";
import { MAX_UINT256, ZERO_ACCOUNT, type CappedToken } from "@capped-token/sdk";
import { deploy, expectTokenError, newAccount } from "./helpers";

describe("CappedToken: multisend", () => {
  let token: CappedToken;
  let owner: PublicKey;
  let sender: PublicKey;
  let b: PublicKey;
  let c: PublicKey;

  beforeEach(() => {
    ({ token, owner } = deploy(BigInt(1000)));
    sender = newAccount();
    b = newAccount();
    c = newAccount();
    token.mint(owner, sender, BigInt(100));
  });

  function balances() {
    return [token.balanceOf(sender), token.balanceOf(b), token.balanceOf(c)];
  }

  it("pays every recipient and drains the caller by the total", () => {
    token.multisend(sender, [b, c], [BigInt(60), BigInt(40)]);

    expect(balances()).to.deep.equal([BigInt(0), BigInt(60), BigInt(40)]);
    expect(token.totalSupply()).to.equal(BigInt(100));
  });

  it("fails as a whole when the total exceeds the caller's balance", () => {
    const before = token.events().length;

    const err = expectTokenError(
      () => token.multisend(sender, [b, c], [BigInt(60), BigInt(50)]),
      "InsufficientBalance"
    );

    expect(err.context.needed).to.equal("110");
    expect(balances()).to.deep.equal([BigInt(100), BigInt(0), BigInt(0)]);
    expect(token.events()).to.have.length(before);
  });

  it("rejects mismatched lengths", () => {
    const err = expectTokenError(() => token.multisend(sender, [b, c], [BigInt(10)]), "LengthMismatch");
    expect(err.context).to.deep.equal({ recipients: "2", amounts: "1" });
    expect(balances()).to.deep.equal([BigInt(100), BigInt(0), BigInt(0)]);
  });

  it("reports a length mismatch before an empty batch", () => {
    expectTokenError(() => token.multisend(sender, [], [BigInt(10)]), "LengthMismatch");
  });

  it("rejects an empty batch", () => {
    expectTokenError(() => token.multisend(sender, [], []), "EmptyBatch");
  });

  it("rolls back earlier transfers when a later recipient is the zero account", () => {
    const before = token.events().length;

    const err = expectTokenError(
      () => token.multisend(sender, [b, ZERO_ACCOUNT, c], [BigInt(10), BigInt(10), BigInt(10)]),
      "InvalidRecipient"
    );

    expect(err.context.index).to.equal("1");
    expect(balances()).to.deep.equal([BigInt(100), BigInt(0), BigInt(0)]);
    expect(token.events()).to.have.length(before);
  });

  it("pays a repeated recipient once per entry", () => {
    token.multisend(sender, [b, c, b], [BigInt(15), BigInt(5), BigInt(30)]);

    expect(balances()).to.deep.equal([BigInt(50), BigInt(45), BigInt(5)]);
  });

  it("emits one Transfer per entry, in the order given", () => {
    const before = token.events().length;

    token.multisend(sender, [c, b], [BigInt(1), BigInt(2)]);

    const emitted = token.events().slice(before);
    expect(emitted.map((e) => e.type)).to.deep.equal(["Transfer", "Transfer"]);
    const [first, second] = emitted;
    if (first.type === "Transfer" && second.type === "Transfer") {
      expect(first.to.equals(c)).to.equal(true);
      expect(first.amount).to.equal(BigInt(1));
      expect(second.to.equals(b)).to.equal(true);
      expect(second.amount).to.equal(BigInt(2));
    }
  });

  it("is blocked while transfers are paused", () => {
    token.pause(owner);

    expectTokenError(() => token.multisend(sender, [b], [BigInt(10)]), "TransfersPaused");
    expect(balances()).to.deep.equal([BigInt(100), BigInt(0), BigInt(0)]);

    token.unpause(owner);
    token.multisend(sender, [b], [BigInt(10)]);
    expect(token.balanceOf(b)).to.equal(BigInt(10));
  });

  it("checks the balance before the pause switch", () => {
    token.pause(owner);
    expectTokenError(() => token.multisend(sender, [b], [BigInt(500)]), "InsufficientBalance");
  });

  it("rejects a total that overflows uint256", () => {
    expectTokenError(() => token.multisend(sender, [b, c], [MAX_UINT256, BigInt(1)]), "ArithmeticOverflow");
    expect(balances()).to.deep.equal([BigInt(100), BigInt(0), BigInt(0)]);
  });

  it("rejects a negative amount", () => {
    const err = expectTokenError(() => token.multisend(sender, [b, c], [BigInt(5), BigInt(-5)]), "InvalidAmount");
    expect(err.context).to.deep.equal({ "amounts[1]": "-5" });
  });

  it("allows zero amounts and the caller as a recipient", () => {
    token.multisend(sender, [sender, b], [BigInt(70), BigInt(0)]);

    expect(balances()).to.deep.equal([BigInt(100), BigInt(0), BigInt(0)]);
  });

  it("lets an account with no balance send an all-zero batch", () => {
    token.multisend(b, [c], [BigInt(0)]);
    expect(token.balanceOf(c)).to.equal(BigInt(0));
  });
});
