import { PublicKey } from "@solana/web3.js";
import { MAX_UINT256, ZERO_ACCOUNT, type Holder } from "./types";
import { TokenError } from "./errors";
import { assertAmount, checkedAdd } from "./math";
import type { EventJournal } from "./events";

interface LedgerCheckpoint {
  totalSupply: bigint;
  mark: number;
}

/** Value a key held before it was overwritten; `undefined` means absent. */
interface UndoEntry {
  map: Map<string, bigint>;
  key: string;
  previous: bigint | undefined;
}

function allowanceKey(owner: PublicKey, spender: PublicKey): string {
  return `${owner.toBase58()}:${spender.toBase58()}`;
}

/**
 * Per-account balances, allowances and total supply.
 *
 * The ledger knows nothing about ownership or pausing; callers compose those
 * checks in front of the primitives.
 */
export class BalanceLedger {
  private supply = BigInt(0);
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();
  private undoLog: UndoEntry[] = [];
  private openCheckpoints = 0;

  constructor(private journal: EventJournal) {}

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(account: PublicKey): bigint {
    return this.balances.get(account.toBase58()) ?? BigInt(0);
  }

  allowance(owner: PublicKey, spender: PublicKey): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? BigInt(0);
  }

  /** Accounts with a non-zero balance, largest first. */
  holders(): Holder[] {
    const out: Holder[] = [];
    for (const [key, balance] of this.balances) {
      if (balance > BigInt(0)) out.push({ account: new PublicKey(key), balance });
    }
    return out.sort((a, b) => (a.balance === b.balance ? 0 : a.balance > b.balance ? -1 : 1));
  }

  allowanceEntries(): Array<{ owner: PublicKey; spender: PublicKey; amount: bigint }> {
    const out: Array<{ owner: PublicKey; spender: PublicKey; amount: bigint }> = [];
    for (const [key, amount] of this.allowances) {
      const [owner, spender] = key.split(":");
      out.push({ owner: new PublicKey(owner), spender: new PublicKey(spender), amount });
    }
    return out;
  }

  transfer(from: PublicKey, to: PublicKey, amount: bigint): void {
    assertAmount(amount);
    if (from.equals(ZERO_ACCOUNT)) {
      throw new TokenError("InvalidSender", "Invalid sender", { from });
    }
    if (to.equals(ZERO_ACCOUNT)) {
      throw new TokenError("InvalidRecipient", "Invalid recipient", { to });
    }

    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      throw new TokenError("InsufficientBalance", "Insufficient balance", {
        account: from,
        balance: fromBalance,
        needed: amount,
      });
    }

    this.write(this.balances, from.toBase58(), fromBalance - amount);
    this.write(this.balances, to.toBase58(), this.balanceOf(to) + amount);
    this.journal.record({ type: "Transfer", from, to, amount });
  }

  mint(to: PublicKey, amount: bigint): void {
    assertAmount(amount);
    if (to.equals(ZERO_ACCOUNT)) {
      throw new TokenError("InvalidRecipient", "Invalid recipient", { to });
    }

    this.supply = checkedAdd(this.supply, amount);
    this.write(this.balances, to.toBase58(), this.balanceOf(to) + amount);
    this.journal.record({ type: "Transfer", from: ZERO_ACCOUNT, to, amount });
  }

  approve(owner: PublicKey, spender: PublicKey, amount: bigint, emitEvent = true): void {
    assertAmount(amount);
    if (owner.equals(ZERO_ACCOUNT)) {
      throw new TokenError("InvalidApprover", "Invalid approver", { owner });
    }
    if (spender.equals(ZERO_ACCOUNT)) {
      throw new TokenError("InvalidSpender", "Invalid spender", { spender });
    }

    this.write(this.allowances, allowanceKey(owner, spender), amount === BigInt(0) ? undefined : amount);
    if (emitEvent) {
      this.journal.record({ type: "Approval", owner, spender, amount });
    }
  }

  /**
   * Consume `amount` of the spender's allowance. An unlimited allowance
   * (2^256-1) is left as is.
   */
  spendAllowance(owner: PublicKey, spender: PublicKey, amount: bigint): void {
    const current = this.allowance(owner, spender);
    if (current === MAX_UINT256) return;
    if (current < amount) {
      throw new TokenError("InsufficientAllowance", "Insufficient allowance", {
        owner,
        spender,
        allowance: current,
        needed: amount,
      });
    }
    this.approve(owner, spender, current - amount, false);
  }

  /**
   * Start recording overwritten keys. Pair every checkpoint with exactly one
   * `restore` or `release`.
   */
  checkpoint(): LedgerCheckpoint {
    this.openCheckpoints++;
    return { totalSupply: this.supply, mark: this.undoLog.length };
  }

  /** Undo every write made since `checkpoint`. */
  restore(checkpoint: LedgerCheckpoint): void {
    for (let i = this.undoLog.length - 1; i >= checkpoint.mark; i--) {
      const { map, key, previous } = this.undoLog[i];
      if (previous === undefined) {
        map.delete(key);
      } else {
        map.set(key, previous);
      }
    }
    this.undoLog.length = checkpoint.mark;
    this.supply = checkpoint.totalSupply;
    this.release();
  }

  /** Keep the writes made since the matching checkpoint. */
  release(): void {
    this.openCheckpoints = Math.max(this.openCheckpoints - 1, 0);
    if (this.openCheckpoints === 0) this.undoLog.length = 0;
  }

  private write(map: Map<string, bigint>, key: string, value: bigint | undefined): void {
    if (this.openCheckpoints > 0) {
      this.undoLog.push({ map, key, previous: map.get(key) });
    }
    if (value === undefined) {
      map.delete(key);
    } else {
      map.set(key, value);
    }
  }

  /** Load persisted state without emitting events. */
  load(
    totalSupply: bigint,
    balances: Array<[PublicKey, bigint]>,
    allowances: Array<{ owner: PublicKey; spender: PublicKey; amount: bigint }>
  ): void {
    this.undoLog.length = 0;
    this.supply = totalSupply;
    this.balances = new Map(balances.map(([account, balance]) => [account.toBase58(), balance]));
    this.allowances = new Map(
      allowances.map(({ owner, spender, amount }) => [allowanceKey(owner, spender), amount])
    );
  }
}
