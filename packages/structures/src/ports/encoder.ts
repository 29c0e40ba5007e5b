/**
 * Encoder defines a lossless transformation between a value `T` and the
 * string stored in a list.
 *
 * @remarks
 * Encoders must be pure and stateless: `decode(encode(x))` reproduces `x` for
 * every value the encoder accepts. They know nothing about structures or the
 * store; `EncodingStructure` applies them.
 *
 * @example
 * ```ts
 * const base64: Encoder<string> = {
 *   name: "base64",
 *   encode: (value) => Buffer.from(value).toString("base64"),
 *   decode: (raw) => Buffer.from(raw, "base64").toString(),
 * }
 * ```
 */
export interface Encoder<T> {
  /** Short identifier used in logs and error context. */
  readonly name: string

  /**
   * @throws when `value` cannot be represented.
   */
  encode(value: T): string

  /**
   * @throws ParseError when `raw` is not a valid encoding.
   */
  decode(raw: string): T
}
