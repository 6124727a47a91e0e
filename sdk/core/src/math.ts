import { MAX_UINT256 } from "./types";
import { TokenError } from "./errors";

/** Reject anything outside the unsigned 256-bit range. */
export function assertAmount(amount: bigint, label = "amount"): void {
  if (typeof amount !== "bigint" || amount < BigInt(0) || amount > MAX_UINT256) {
    throw new TokenError("InvalidAmount", "Amount out of range", { [label]: amount });
  }
}

/** uint256 addition that throws instead of wrapping. */
export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > MAX_UINT256) {
    throw new TokenError("ArithmeticOverflow", "Addition overflow", { a, b });
  }
  return sum;
}

/**
 * Whether `current + amount` stays within `ceiling`. bigint addition never
 * wraps, so an oversized `amount` can only push the sum further past it.
 */
export function fitsUnder(current: bigint, amount: bigint, ceiling: bigint): boolean {
  return current + amount <= ceiling;
}

export function sumAmounts(amounts: readonly bigint[]): bigint {
  return amounts.reduce((total, amount) => checkedAdd(total, amount), BigInt(0));
}
