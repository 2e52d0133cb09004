/**
 * JSON encoding for values crossing the HTTP transport.
 * Bigints (balances) are encoded as `{ "$bigint": "<digits>" }`.
 */

const BIGINT_TAG = `$bigint`

export function serialize(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) =>
    typeof v === `bigint` ? { [BIGINT_TAG]: v.toString() } : v
  )
}

export function deserialize(text: string): unknown {
  return JSON.parse(text, (_key, v: unknown) => {
    if (typeof v === `object` && v !== null && !Array.isArray(v)) {
      const keys = Object.keys(v)
      const digits: unknown = Reflect.get(v, BIGINT_TAG)
      if (
        keys.length === 1 &&
        typeof digits === `string` &&
        /^-?\d+$/.test(digits)
      ) {
        return BigInt(digits)
      }
    }
    return v
  })
}
