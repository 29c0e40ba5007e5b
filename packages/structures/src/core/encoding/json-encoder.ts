import type { ZodType } from "zod"
import type { Encoder } from "../../ports/encoder"
import { fromJsonText, toJsonText } from "./json-text"
import { type JsonValue, jsonValueSchema } from "./json-value"

/**
 * Stores items as JSON text.
 *
 * @remarks
 * Items are checked against the schema on `encode` as well as `decode`, and
 * plain JSON does not keep `Date`, `Map`, `Set`, class instances or non-finite
 * numbers. Store such values in a JSON-safe form.
 */
export class JsonEncoder<T> implements Encoder<T> {
  readonly name = "json"

  public constructor(private readonly schema: ZodType<T>) {}

  encode(value: T): string {
    return toJsonText(value, this.schema)
  }

  decode(raw: string): T {
    return fromJsonText(raw, this.schema)
  }
}

export function jsonEncoder(): JsonEncoder<JsonValue>
export function jsonEncoder<T>(schema: ZodType<T>): JsonEncoder<T>
export function jsonEncoder<T>(schema?: ZodType<T>): JsonEncoder<T> | JsonEncoder<JsonValue> {
  return schema ? new JsonEncoder(schema) : new JsonEncoder(jsonValueSchema)
}
