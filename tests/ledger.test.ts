import { expect } from "chai";
import { BalanceLedger, EventJournal, MAX_UINT256, ZERO_ACCOUNT } from "@capped-token/sdk";
import { deploy, expectTokenError, newAccount } from "./helpers";

describe("BalanceLedger", () => {
  it("moves balances and records a Transfer", () => {
    const journal = new EventJournal();
    const ledger = new BalanceLedger(journal);
    const alice = newAccount();
    const bob = newAccount();

    ledger.mint(alice, BigInt(30));
    ledger.transfer(alice, bob, BigInt(12));

    expect(ledger.balanceOf(alice)).to.equal(BigInt(18));
    expect(ledger.balanceOf(bob)).to.equal(BigInt(12));
    expect(ledger.totalSupply()).to.equal(BigInt(30));
    expect(journal.all().map((e) => e.type)).to.deep.equal(["Transfer", "Transfer"]);
  });

  it("rejects short balances and the zero account", () => {
    const ledger = new BalanceLedger(new EventJournal());
    const alice = newAccount();
    ledger.mint(alice, BigInt(5));

    expectTokenError(() => ledger.transfer(alice, newAccount(), BigInt(6)), "InsufficientBalance");
    expectTokenError(() => ledger.transfer(alice, ZERO_ACCOUNT, BigInt(1)), "InvalidRecipient");
    expectTokenError(() => ledger.transfer(ZERO_ACCOUNT, alice, BigInt(1)), "InvalidSender");
    expectTokenError(() => ledger.approve(alice, ZERO_ACCOUNT, BigInt(1)), "InvalidSpender");
    expectTokenError(() => ledger.approve(ZERO_ACCOUNT, alice, BigInt(1)), "InvalidApprover");
  });

  it("lists holders largest first", () => {
    const ledger = new BalanceLedger(new EventJournal());
    const [a, b, c] = [newAccount(), newAccount(), newAccount()];
    ledger.mint(a, BigInt(5));
    ledger.mint(b, BigInt(50));
    ledger.mint(c, BigInt(20));
    ledger.transfer(a, b, BigInt(5));

    const holders = ledger.holders();
    expect(holders.map((h) => h.balance)).to.deep.equal([BigInt(55), BigInt(20)]);
    expect(holders[0].account.equals(b)).to.equal(true);
  });

  it("restores a checkpoint", () => {
    const ledger = new BalanceLedger(new EventJournal());
    const alice = newAccount();
    ledger.mint(alice, BigInt(10));
    const checkpoint = ledger.checkpoint();

    ledger.mint(alice, BigInt(90));
    ledger.restore(checkpoint);

    expect(ledger.balanceOf(alice)).to.equal(BigInt(10));
    expect(ledger.totalSupply()).to.equal(BigInt(10));
  });

  it("undoes only the keys written since the checkpoint", () => {
    const ledger = new BalanceLedger(new EventJournal());
    const [alice, bob, carol] = [newAccount(), newAccount(), newAccount()];
    ledger.mint(alice, BigInt(50));
    ledger.approve(alice, bob, BigInt(20));
    const checkpoint = ledger.checkpoint();

    ledger.transfer(alice, carol, BigInt(30));
    ledger.spendAllowance(alice, bob, BigInt(20));
    ledger.transfer(carol, alice, BigInt(5));
    ledger.restore(checkpoint);

    expect(ledger.balanceOf(alice)).to.equal(BigInt(50));
    expect(ledger.allowance(alice, bob)).to.equal(BigInt(20));
    expect(ledger.holders().map((h) => h.account.toBase58())).to.deep.equal([alice.toBase58()]);
  });

  it("keeps released writes out of a later rollback", () => {
    const ledger = new BalanceLedger(new EventJournal());
    const alice = newAccount();

    ledger.checkpoint();
    ledger.mint(alice, BigInt(7));
    ledger.release();

    const checkpoint = ledger.checkpoint();
    ledger.mint(alice, BigInt(3));
    ledger.restore(checkpoint);

    expect(ledger.balanceOf(alice)).to.equal(BigInt(7));
    expect(ledger.totalSupply()).to.equal(BigInt(7));
  });
});

describe("CappedToken: allowances", () => {
  it("spends an allowance through transferFrom", () => {
    const { token, owner } = deploy();
    const holder = newAccount();
    const spender = newAccount();
    const dest = newAccount();
    token.mint(owner, holder, BigInt(100));

    token.approve(holder, spender, BigInt(40));
    token.transferFrom(spender, holder, dest, BigInt(25));

    expect(token.allowance(holder, spender)).to.equal(BigInt(15));
    expect(token.balanceOf(holder)).to.equal(BigInt(75));
    expect(token.balanceOf(dest)).to.equal(BigInt(25));
  });

  it("rejects spending beyond the allowance", () => {
    const { token, owner } = deploy();
    const holder = newAccount();
    const spender = newAccount();
    token.mint(owner, holder, BigInt(100));
    token.approve(holder, spender, BigInt(10));

    expectTokenError(() => token.transferFrom(spender, holder, spender, BigInt(11)), "InsufficientAllowance");
    expect(token.allowance(holder, spender)).to.equal(BigInt(10));
    expect(token.balanceOf(holder)).to.equal(BigInt(100));
  });

  it("keeps an unlimited allowance untouched", () => {
    const { token, owner } = deploy();
    const holder = newAccount();
    const spender = newAccount();
    token.mint(owner, holder, BigInt(100));
    token.approve(holder, spender, MAX_UINT256);

    token.transferFrom(spender, holder, spender, BigInt(60));

    expect(token.allowance(holder, spender)).to.equal(MAX_UINT256);
  });

  it("restores the allowance when the transfer leg fails", () => {
    const { token, owner } = deploy();
    const holder = newAccount();
    const spender = newAccount();
    token.mint(owner, holder, BigInt(5));
    token.approve(holder, spender, BigInt(50));

    expectTokenError(() => token.transferFrom(spender, holder, spender, BigInt(20)), "InsufficientBalance");
    expect(token.allowance(holder, spender)).to.equal(BigInt(50));
  });

  it("allows approvals but not transferFrom while paused", () => {
    const { token, owner } = deploy();
    const holder = newAccount();
    const spender = newAccount();
    token.mint(owner, holder, BigInt(100));
    token.pause(owner);

    token.approve(holder, spender, BigInt(30));
    expect(token.allowance(holder, spender)).to.equal(BigInt(30));
    expectTokenError(() => token.transferFrom(spender, holder, spender, BigInt(1)), "TransfersPaused");
  });
});
