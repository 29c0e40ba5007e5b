import type { ZodType } from "zod"
import { z } from "zod"
import { ParseError } from "../errors/errors"

/**
 * Checks `value` against `schema` and serializes it to JSON text.
 *
 * @throws TypeError for values JSON cannot represent at the top level
 * (`undefined`, functions, symbols), BigInt, or cyclic structures.
 * @throws ParseError when `value` does not satisfy `schema`, so nothing that
 * would fail to decode is ever written.
 */
export function toJsonText<T>(value: T, schema: ZodType<T>): string {
  const text = JSON.stringify(value)

  if (text === undefined) {
    throw new TypeError(`Value of type ${typeof value} has no JSON representation`)
  }

  const result = schema.safeParse(value)

  if (!result.success) {
    throw new ParseError(`Value does not match schema:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
      context: { text },
    })
  }

  return text
}

/**
 * Parses JSON text and checks the result against `schema`.
 *
 * @throws ParseError on malformed text or a schema mismatch.
 */
export function fromJsonText<T>(text: string, schema: ZodType<T>): T {
  let parsed: unknown

  try {
    parsed = JSON.parse(text)
  } catch (err) {
    throw new ParseError("Malformed JSON", { cause: err, context: { text } })
  }

  const result = schema.safeParse(parsed)

  if (!result.success) {
    throw new ParseError(`JSON does not match schema:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
      context: { text },
    })
  }

  return result.data
}
