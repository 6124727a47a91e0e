import { PublicKey } from "@solana/web3.js";
import { TokenError } from "./errors";
import type { EventJournal } from "./events";

/** Global pause switch in front of every balance transfer. */
export class TransferGate {
  private paused = false;

  constructor(private journal: EventJournal) {}

  isPaused(): boolean {
    return this.paused;
  }

  canTransfer(): boolean {
    return !this.paused;
  }

  assertCanTransfer(): void {
    if (!this.canTransfer()) {
      throw new TokenError("TransfersPaused", "Token transfers are paused");
    }
  }

  pause(account: PublicKey): void {
    if (this.paused) {
      throw new TokenError("AlreadyPaused", "Token is already paused");
    }
    this.paused = true;
    this.journal.record({ type: "Paused", account });
  }

  unpause(account: PublicKey): void {
    if (!this.paused) {
      throw new TokenError("NotPaused", "Token is not paused");
    }
    this.paused = false;
    this.journal.record({ type: "Unpaused", account });
  }

  restore(paused: boolean): void {
    this.paused = paused;
  }
}
