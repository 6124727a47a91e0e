import { PublicKey } from "@solana/web3.js";
import { ZERO_ACCOUNT, type Authorization } from "./types";
import { TokenError } from "./errors";
import type { EventJournal } from "./events";

/**
 * Single-owner access control. The owner is set at construction and can be
 * handed over or renounced; a renounced token has no owner at all.
 */
export class OwnershipGuard {
  private current: PublicKey | null;

  constructor(private journal: EventJournal, initialOwner: PublicKey | null, emitEvent = true) {
    if (initialOwner !== null && initialOwner.equals(ZERO_ACCOUNT)) {
      throw new TokenError("InvalidOwner", "Invalid owner", { owner: initialOwner });
    }
    this.current = initialOwner;
    if (emitEvent && initialOwner !== null) {
      this.journal.record({ type: "OwnershipTransferred", previousOwner: null, newOwner: initialOwner });
    }
  }

  owner(): PublicKey | null {
    return this.current;
  }

  authorize(caller: PublicKey): Authorization {
    if (this.current === null) {
      return { ok: false, reason: "Ownership renounced" };
    }
    if (!caller.equals(this.current)) {
      return { ok: false, reason: "Caller is not the owner" };
    }
    return { ok: true, owner: this.current };
  }

  requireOwner(caller: PublicKey): PublicKey {
    const auth = this.authorize(caller);
    if (!auth.ok) {
      throw new TokenError("Unauthorized", auth.reason, { caller });
    }
    return auth.owner;
  }

  transferOwnership(caller: PublicKey, newOwner: PublicKey): void {
    const previousOwner = this.requireOwner(caller);
    if (newOwner.equals(ZERO_ACCOUNT)) {
      throw new TokenError("InvalidOwner", "Invalid owner", { newOwner });
    }
    this.current = newOwner;
    this.journal.record({ type: "OwnershipTransferred", previousOwner, newOwner });
  }

  renounceOwnership(caller: PublicKey): void {
    const previousOwner = this.requireOwner(caller);
    this.current = null;
    this.journal.record({ type: "OwnershipTransferred", previousOwner, newOwner: null });
  }

  restore(owner: PublicKey | null): void {
    this.current = owner;
  }
}
