/**
 * A source of raw configuration values.
 *
 * @remarks
 * Sources only load. Validation, coercion and defaults happen in
 * `loadStoreConfig`. Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Human-readable name, e.g. "env" or "object:overrides". */
  readonly name: string

  /** Returning `undefined` for a key means "not provided". */
  load(): Promise<Record<string, unknown>>
}
