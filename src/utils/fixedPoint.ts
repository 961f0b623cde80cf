/** Fixed-point scale shared by the revenue index, reward accumulators and price multipliers. */
export const SCALE = 10n ** 18n;

/** Basis-point divisor for the bribe split. */
export const DIVISOR = 10_000n;

export const UINT192_MAX = (1n << 192n) - 1n;

export const minBig = (a: bigint, b: bigint): bigint => (a < b ? a : b);
export const maxBig = (a: bigint, b: bigint): bigint => (a > b ? a : b);

export const sumBig = (values: Iterable<bigint>): bigint => {
  let total = 0n;
  for (const value of values) total += value;
  return total;
};

/** Parses a non-negative integer amount written in base units. */
export const parseAmount = (input: string): bigint => {
  if (!/^\d+$/.test(input)) {
    throw new RangeError(`Not a base-unit integer amount: "${input}"`);
  }
  return BigInt(input);
};

/** Converts a human amount such as "1.5" into base units of the given decimals. */
export const toUnits = (human: string, decimals: number): bigint => {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(human.trim());
  if (!match) {
    throw new RangeError(`Not a decimal amount: "${human}"`);
  }
  const whole = match[1] ?? '0';
  const fraction = (match[2] ?? '').padEnd(decimals, '0');
  if (fraction.length > decimals) {
    throw new RangeError(`"${human}" has more than ${decimals} decimals`);
  }
  return BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fraction || '0');
};
