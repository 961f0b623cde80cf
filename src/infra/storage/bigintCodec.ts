/**
 * JSON encoding that keeps bigints exact: every bigint is written as
 * `{ "$bigint": "<decimal>" }` and revived on parse.
 */

const isTaggedBigint = (value: unknown): value is { $bigint: string } => (
  typeof value === 'object'
  && value !== null
  && '$bigint' in value
  && typeof value.$bigint === 'string'
  && /^-?\d+$/.test(value.$bigint)
);

export const encodeJson = (value: unknown): string => JSON.stringify(
  value,
  (_key, item: unknown) => (typeof item === 'bigint' ? { $bigint: item.toString() } : item),
  2,
);

export const decodeJson = (raw: string): unknown => JSON.parse(
  raw,
  (_key, item: unknown) => (isTaggedBigint(item) ? BigInt(item.$bigint) : item),
);
