/**
 * Deterministic Rendering
 *
 * Renders any value to a stable text form, used both to compare values
 * structurally and to print them in divergence reports:
 * - object keys are sorted, `undefined` properties are omitted
 * - Map entries and Set members are sorted by their rendering
 * - bigints print with an `n` suffix so they never collide with numbers
 * - strings are JSON-quoted
 */

const INDENT = `  `

/**
 * Render a value to its canonical text form.
 */
export function render(value: unknown): string {
  return renderAt(value, ``, new Set())
}

/**
 * Two values are structurally equal when their canonical renderings match.
 */
export function structurallyEqual(a: unknown, b: unknown): boolean {
  return a === b || render(a) === render(b)
}

function renderAt(value: unknown, indent: string, seen: Set<object>): string {
  switch (typeof value) {
    case `undefined`:
      return `undefined`
    case `boolean`:
      return String(value)
    case `number`:
      return Object.is(value, -0) ? `-0` : String(value)
    case `bigint`:
      return `${value}n`
    case `string`:
      return JSON.stringify(value)
    case `symbol`:
      return value.toString()
    case `function`:
      return `[Function ${value.name || `anonymous`}]`
  }

  if (typeof value !== `object` || value === null) return `null`

  if (seen.has(value)) return `[Circular]`
  seen.add(value)
  try {
    const inner = indent + INDENT

    if (Array.isArray(value)) {
      const items: Array<string> = value.map((item: unknown) =>
        renderAt(item, inner, seen)
      )
      return block(`[`, `]`, items, indent)
    }

    if (value instanceof Map) {
      const entries: Array<string> = []
      for (const [k, v] of value) {
        entries.push(
          `${renderAt(k, inner, seen)} => ${renderAt(v, inner, seen)}`
        )
      }
      return `Map ` + block(`{`, `}`, entries.sort(), indent)
    }

    if (value instanceof Set) {
      const members: Array<string> = []
      for (const member of value) {
        members.push(renderAt(member, inner, seen))
      }
      return `Set ` + block(`[`, `]`, members.sort(), indent)
    }

    if (value instanceof Date) {
      return `Date(${value.toISOString()})`
    }

    const fields: Array<string> = []
    for (const key of Object.keys(value).sort()) {
      const field: unknown = Reflect.get(value, key)
      if (field === undefined) continue
      fields.push(`${JSON.stringify(key)}: ${renderAt(field, inner, seen)}`)
    }
    return block(`{`, `}`, fields, indent)
  } finally {
    seen.delete(value)
  }
}

function block(
  open: string,
  close: string,
  items: Array<string>,
  indent: string
): string {
  if (items.length === 0) return `${open}${close}`
  const inner = indent + INDENT
  return `${open}\n${items.map((item) => inner + item).join(`,\n`)}\n${indent}${close}`
}
