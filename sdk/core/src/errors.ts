import { PublicKey } from "@solana/web3.js";

export type TokenErrorCode =
  | "ConstructionInvalid"
  | "Unauthorized"
  | "SupplyExceeded"
  | "LengthMismatch"
  | "EmptyBatch"
  | "InsufficientBalance"
  | "InvalidRecipient"
  | "TransfersPaused"
  | "InvalidAmount"
  | "ArithmeticOverflow"
  | "InvalidSender"
  | "InvalidApprover"
  | "InvalidSpender"
  | "InsufficientAllowance"
  | "InvalidOwner"
  | "AlreadyPaused"
  | "NotPaused"
  | "CorruptSnapshot";

/**
 * Raised by every failed token operation. The call that threw has had no
 * effect on balances, supply, ownership, the pause flag or the event log.
 */
export class TokenError extends Error {
  public readonly code: TokenErrorCode;
  public readonly reason: string;
  public readonly context: Record<string, string>;

  constructor(code: TokenErrorCode, reason: string, context: Record<string, unknown> = {}) {
    const rendered = renderContext(context);
    const contextStr = Object.entries(rendered)
      .map(([key, value]) => `${key}: ${value}`)
      .join(", ");
    super(contextStr ? `${reason} (${contextStr})` : reason);
    this.name = "TokenError";
    this.code = code;
    this.reason = reason;
    this.context = rendered;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      reason: this.reason,
      context: this.context,
    };
  }
}

export function isTokenError(err: unknown, code?: TokenErrorCode): err is TokenError {
  return err instanceof TokenError && (code === undefined || err.code === code);
}

function renderContext(context: Record<string, unknown>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = renderValue(value);
  }
  return out;
}

function renderValue(value: unknown): string {
  if (value instanceof PublicKey) return value.toBase58();
  if (Array.isArray(value)) return `[${value.map(renderValue).join(", ")}]`;
  return String(value);
}
