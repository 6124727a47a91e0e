import { DEFAULT_DECIMALS, type TokenConfig } from "./types";
import { TokenError } from "./errors";

/**
 * Default capped token: 18 decimals, one million whole units.
 */
export function cappedPreset(overrides: Partial<TokenConfig> = {}): TokenConfig {
  const decimals = overrides.decimals ?? DEFAULT_DECIMALS;
  assertDecimals(decimals);
  return {
    name: "Capped Token",
    symbol: "CAP",
    decimals,
    maxSupply: overrides.maxSupply ?? BigInt(1_000_000) * BigInt(10) ** BigInt(decimals),
    ...overrides,
  };
}

export function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
    throw new TokenError("ConstructionInvalid", "Decimals must be an integer in 0..255", { decimals });
  }
}

/** Convert whole units to base units, e.g. `toBaseUnits("1.5", 6) === 1500000n`. */
export function toBaseUnits(amount: string, decimals: number): bigint {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(amount.trim());
  if (!match) {
    throw new TokenError("InvalidAmount", "Invalid amount", { amount });
  }
  const [, whole, fraction = ""] = match;
  if (fraction.length > decimals) {
    throw new TokenError("InvalidAmount", "Too many decimal places", { amount, decimals });
  }
  return BigInt(whole + fraction.padEnd(decimals, "0"));
}

export function formatUnits(amount: bigint, decimals: number): string {
  if (decimals === 0) return amount.toString();
  const padded = amount.toString().padStart(decimals + 1, "0");
  const whole = padded.slice(0, padded.length - decimals);
  const fraction = padded.slice(padded.length - decimals).replace(/0+$/, "");
  return fraction ? `${whole}.${fraction}` : whole;
}
