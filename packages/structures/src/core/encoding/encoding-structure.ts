import { type Logger, NullLogger } from "@qredis/logger"
import type { Encoder } from "../../ports/encoder"
import type { GetOptions, GetResult, Structure, StructureKind } from "../../ports/structure"
import { DecodingError, EncodingError } from "../errors/errors"

export type EncodingStructureDeps<T> = {
  inner: Structure<string>
  encoder: Encoder<T>
  logger?: Logger
}

/**
 * Decorates a string structure so callers put and get typed items.
 *
 * @remarks
 * Decorators stack: wrapping an `EncodingStructure` in another one applies
 * the outer encoder first on `put` and last on `get`.
 */
export class EncodingStructure<T> implements Structure<T> {
  private readonly inner: Structure<string>
  private readonly encoder: Encoder<T>
  private readonly logger: Logger

  public constructor(deps: EncodingStructureDeps<T>) {
    this.inner = deps.inner
    this.encoder = deps.encoder
    this.logger = (deps.logger ?? new NullLogger()).child({
      structure: deps.inner.key,
      kind: deps.inner.kind,
      encoder: deps.encoder.name,
    })
  }

  get key(): string {
    return this.inner.key
  }

  get kind(): StructureKind {
    return this.inner.kind
  }

  async size(): Promise<number> {
    return await this.inner.size()
  }

  async empty(): Promise<boolean> {
    return await this.inner.empty()
  }

  /**
   * @throws EncodingError if the encoder rejects `item`; nothing is written.
   */
  async put(item: T): Promise<void> {
    let encoded: string

    try {
      encoded = this.encoder.encode(item)
    } catch (err) {
      throw new EncodingError(item, {
        encoder: this.encoder.name,
        key: this.inner.key,
        cause: err,
      })
    }

    await this.inner.put(encoded)
  }

  /**
   * @throws DecodingError if the stored value cannot be decoded. The value is
   * already gone from the store at that point.
   */
  async get(opts?: GetOptions): Promise<GetResult<T>> {
    const res = await this.inner.get(opts)

    if (res.kind === "empty") return res

    try {
      return { kind: "found", value: this.encoder.decode(res.value) }
    } catch (err) {
      this.logger.warn("dropped undecodable item", { op: "get", err })

      throw new DecodingError(res.value, {
        encoder: this.encoder.name,
        key: this.inner.key,
        cause: err,
      })
    }
  }
}

export function withEncoding<T>(
  inner: Structure<string>,
  encoder: Encoder<T>,
  logger?: Logger,
): EncodingStructure<T> {
  return new EncodingStructure({ inner, encoder, ...(logger && { logger }) })
}
