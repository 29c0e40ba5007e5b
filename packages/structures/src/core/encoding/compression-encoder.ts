import { deflateSync, inflateSync } from "node:zlib"
import type { ZodType } from "zod"
import type { Encoder } from "../../ports/encoder"
import { ParseError } from "../errors/errors"
import { fromJsonText, toJsonText } from "./json-text"
import { type JsonValue, jsonValueSchema } from "./json-value"

export type CompressionEncoderOptions<T> = {
  schema: ZodType<T>

  /** zlib compression level, -1 (library default) to 9. */
  level?: number
}

/**
 * Serializes items to JSON, deflates them (zlib format) and stores base64 text.
 *
 * @remarks
 * Decoding only ever parses JSON; stored text is never evaluated.
 */
export class CompressionEncoder<T> implements Encoder<T> {
  readonly name = "zlib"

  private readonly schema: ZodType<T>
  private readonly level: number

  public constructor(opts: CompressionEncoderOptions<T>) {
    this.schema = opts.schema
    this.level = opts.level ?? -1
  }

  encode(value: T): string {
    const compressed = deflateSync(toJsonText(value, this.schema), { level: this.level })

    return compressed.toString("base64")
  }

  decode(raw: string): T {
    let text: string

    try {
      text = inflateSync(Buffer.from(raw, "base64")).toString("utf8")
    } catch (err) {
      throw new ParseError("Value is not zlib-compressed data", {
        cause: err,
        context: { raw },
      })
    }

    return fromJsonText(text, this.schema)
  }
}

export function compressionEncoder(
  opts?: Omit<CompressionEncoderOptions<JsonValue>, "schema">,
): CompressionEncoder<JsonValue>
export function compressionEncoder<T>(
  opts: CompressionEncoderOptions<T>,
): CompressionEncoder<T>
export function compressionEncoder<T>(
  opts: Partial<CompressionEncoderOptions<T>> = {},
): CompressionEncoder<T> | CompressionEncoder<JsonValue> {
  const level = opts.level === undefined ? {} : { level: opts.level }

  return opts.schema
    ? new CompressionEncoder({ schema: opts.schema, ...level })
    : new CompressionEncoder({ schema: jsonValueSchema, ...level })
}
