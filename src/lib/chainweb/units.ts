export const TOKEN_DECIMALS = 18;
export const WEI = 10n ** BigInt(TOKEN_DECIMALS);

/**
 * Scale a token amount to its 18-decimal integer representation.
 * Only the first nine decimal places of `value` are kept.
 */
export function toWei(value: number): bigint {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot scale non-finite value: ${value}`);
  }
  return BigInt(Math.round(value * 1e9)) * 10n ** 9n;
}

/** Exact decimal string of a wei amount, always with a fractional part (`10.0`, `0.25`) */
export function formatWei(amount: bigint): string {
  const negative = amount < 0n;
  const abs = negative ? -amount : amount;
  const whole = abs / WEI;
  const fraction = (abs % WEI).toString().padStart(TOKEN_DECIMALS, '0').replace(/0+$/, '');
  return `${negative ? '-' : ''}${whole}.${fraction || '0'}`;
}

export const weiToNumber = (amount: bigint): number => Number(formatWei(amount));
