import { PublicKey } from "@solana/web3.js";
import {
  MAX_UINT256,
  ZERO_ACCOUNT,
  type Holder,
  type TokenConfig,
  type TokenEvent,
  type TokenState,
  type TransferPlanEntry,
} from "./types";
import { TokenError } from "./errors";
import { assertAmount, fitsUnder, sumAmounts } from "./math";
import { EventJournal } from "./events";
import { BalanceLedger } from "./ledger";
import { OwnershipGuard } from "./access";
import { TransferGate } from "./gate";
import { assertDecimals } from "./presets";
import { assertConsistentState } from "./snapshot";

function validateConfig(config: TokenConfig): void {
  if (typeof config.maxSupply !== "bigint" || config.maxSupply <= BigInt(0)) {
    throw new TokenError("ConstructionInvalid", "Max supply must be > 0", { maxSupply: config.maxSupply });
  }
  if (config.maxSupply > MAX_UINT256) {
    throw new TokenError("ConstructionInvalid", "Max supply exceeds uint256", { maxSupply: config.maxSupply });
  }
  if (config.name.trim().length === 0) {
    throw new TokenError("ConstructionInvalid", "Name must not be empty");
  }
  if (config.symbol.trim().length === 0) {
    throw new TokenError("ConstructionInvalid", "Symbol must not be empty");
  }
  assertDecimals(config.decimals);
}

/**
 * Fungible token with a fixed supply ceiling, owner-only minting, a pause
 * switch on transfers and an all-or-nothing batch transfer.
 *
 * Every mutating method takes the calling account explicitly and either
 * applies all of its effects or none of them.
 */
export class CappedToken {
  private readonly journal = new EventJournal();
  private readonly ledger: BalanceLedger;
  private readonly guard: OwnershipGuard;
  private readonly gate: TransferGate;

  private constructor(
    private readonly config: Readonly<TokenConfig>,
    owner: PublicKey | null,
    announceOwner: boolean
  ) {
    this.ledger = new BalanceLedger(this.journal);
    this.guard = new OwnershipGuard(this.journal, owner, announceOwner);
    this.gate = new TransferGate(this.journal);
  }

  /**
   * Deploy a new token. The deployer becomes the owner.
   */
  static create(config: TokenConfig, deployer: PublicKey): CappedToken {
    validateConfig(config);
    if (deployer.equals(ZERO_ACCOUNT)) {
      throw new TokenError("ConstructionInvalid", "Deployer must not be the zero account");
    }
    return new CappedToken({ ...config }, deployer, true);
  }

  /**
   * Rebuild a token from a snapshot. The event log starts empty.
   */
  static restore(state: TokenState): CappedToken {
    validateConfig(state.config);
    assertConsistentState(state);
    const token = new CappedToken({ ...state.config }, state.owner, false);
    token.gate.restore(state.paused);
    token.ledger.load(state.totalSupply, state.balances, state.allowances);
    return token;
  }

  // ── Reads ────────────────────────────────────────────────────────

  get name(): string {
    return this.config.name;
  }

  get symbol(): string {
    return this.config.symbol;
  }

  get decimals(): number {
    return this.config.decimals;
  }

  maxSupply(): bigint {
    return this.config.maxSupply;
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply();
  }

  balanceOf(account: PublicKey): bigint {
    return this.ledger.balanceOf(account);
  }

  allowance(owner: PublicKey, spender: PublicKey): bigint {
    return this.ledger.allowance(owner, spender);
  }

  owner(): PublicKey | null {
    return this.guard.owner();
  }

  paused(): boolean {
    return this.gate.isPaused();
  }

  holders(): Holder[] {
    return this.ledger.holders();
  }

  events(): readonly TokenEvent[] {
    return this.journal.all();
  }

  snapshot(): TokenState {
    return {
      config: { ...this.config },
      owner: this.guard.owner(),
      paused: this.gate.isPaused(),
      totalSupply: this.ledger.totalSupply(),
      balances: this.ledger.holders().map((h): [PublicKey, bigint] => [h.account, h.balance]),
      allowances: this.ledger.allowanceEntries(),
    };
  }

  // ── Capped issuance ──────────────────────────────────────────────

  /**
   * Mint `amount` new units to `recipient` (owner only). Fails with
   * `SupplyExceeded` when the result would pass `maxSupply()`.
   * Minting is not affected by the pause switch.
   */
  mint(caller: PublicKey, recipient: PublicKey, amount: bigint): void {
    this.atomic(() => {
      this.guard.requireOwner(caller);
      assertAmount(amount);

      const supply = this.ledger.totalSupply();
      if (!fitsUnder(supply, amount, this.config.maxSupply)) {
        throw new TokenError("SupplyExceeded", "Exceeds max supply", {
          totalSupply: supply,
          amount,
          maxSupply: this.config.maxSupply,
        });
      }

      this.ledger.mint(recipient, amount);
    });
  }

  // ── Batch disbursement ───────────────────────────────────────────

  /**
   * Transfer `amounts[i]` from `caller` to `recipients[i]` for every i, in
   * order. The whole batch is validated against the caller's balance before
   * anything moves; any failure leaves every balance untouched.
   */
  multisend(caller: PublicKey, recipients: readonly PublicKey[], amounts: readonly bigint[]): void {
    if (recipients.length !== amounts.length) {
      throw new TokenError("LengthMismatch", "Recipients and amounts length mismatch", {
        recipients: recipients.length,
        amounts: amounts.length,
      });
    }
    if (recipients.length === 0) {
      throw new TokenError("EmptyBatch", "Empty batch");
    }

    amounts.forEach((amount, i) => assertAmount(amount, `amounts[${i}]`));
    const total = sumAmounts(amounts);

    const balance = this.ledger.balanceOf(caller);
    if (balance < total) {
      throw new TokenError("InsufficientBalance", "Insufficient balance", {
        account: caller,
        balance,
        needed: total,
      });
    }

    const plan = this.planDisbursement(recipients, amounts);

    this.atomic(() => {
      for (const entry of plan) {
        this.ledger.transfer(caller, entry.to, entry.amount);
      }
    });
  }

  private planDisbursement(recipients: readonly PublicKey[], amounts: readonly bigint[]): TransferPlanEntry[] {
    return recipients.map((to, index) => {
      if (to.equals(ZERO_ACCOUNT)) {
        throw new TokenError("InvalidRecipient", "Invalid recipient", { index, to });
      }
      this.gate.assertCanTransfer();
      return { to, amount: amounts[index] };
    });
  }

  // ── Transfers & allowances ───────────────────────────────────────

  transfer(caller: PublicKey, to: PublicKey, amount: bigint): void {
    this.atomic(() => {
      this.gate.assertCanTransfer();
      this.ledger.transfer(caller, to, amount);
    });
  }

  approve(caller: PublicKey, spender: PublicKey, amount: bigint): void {
    this.atomic(() => this.ledger.approve(caller, spender, amount));
  }

  transferFrom(caller: PublicKey, from: PublicKey, to: PublicKey, amount: bigint): void {
    this.atomic(() => {
      this.gate.assertCanTransfer();
      assertAmount(amount);
      this.ledger.spendAllowance(from, caller, amount);
      this.ledger.transfer(from, to, amount);
    });
  }

  // ── Owner operations ─────────────────────────────────────────────

  pause(caller: PublicKey): void {
    this.atomic(() => {
      this.guard.requireOwner(caller);
      this.gate.pause(caller);
    });
  }

  unpause(caller: PublicKey): void {
    this.atomic(() => {
      this.guard.requireOwner(caller);
      this.gate.unpause(caller);
    });
  }

  transferOwnership(caller: PublicKey, newOwner: PublicKey): void {
    this.atomic(() => this.guard.transferOwnership(caller, newOwner));
  }

  renounceOwnership(caller: PublicKey): void {
    this.atomic(() => this.guard.renounceOwnership(caller));
  }

  /**
   * Run `body` as one unit: if it throws, balances, supply, allowances,
   * owner, pause flag and the event log are put back as they were.
   */
  private atomic<T>(body: () => T): T {
    const mark = this.journal.mark();
    const checkpoint = this.ledger.checkpoint();
    const owner = this.guard.owner();
    const paused = this.gate.isPaused();

    try {
      const result = body();
      this.ledger.release();
      return result;
    } catch (err) {
      this.journal.rollback(mark);
      this.ledger.restore(checkpoint);
      this.guard.restore(owner);
      this.gate.restore(paused);
      throw err;
    }
  }
}
