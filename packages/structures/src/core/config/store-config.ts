import { logLevelNames } from "@qredis/logger"
import { z } from "zod"
import { ConfigurationError } from "../errors/errors"
import type { ConfigSource } from "./config-source"
import { EnvSource } from "./env-source"

export const DEFAULT_ENV_PREFIX = "QREDIS_"

export const storeConfigSchema = z.object({
  REDIS_URL: z.string().min(1).optional(),
  REDIS_HOST: z.string().min(1).default("localhost"),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  REDIS_USERNAME: z.string().min(1).optional(),
  REDIS_PASSWORD: z.string().min(1).optional(),
  KEYSPACE_PREFIX: z.string().default(""),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
})

export type StoreConfig = z.infer<typeof storeConfigSchema>

export type LoadStoreConfigOptions = {
  /** @default [new EnvSource({ prefix: "QREDIS_" })] */
  sources?: ConfigSource[]
}

/**
 * Merges the sources in order and validates the result.
 *
 * @example
 * ```ts
 * const config = await loadStoreConfig({
 *   sources: [new EnvSource({ prefix: "QREDIS_" }), new ObjectSource({ REDIS_DB: 2 })],
 * })
 * ```
 *
 * @throws ConfigurationError listing every invalid key.
 */
export async function loadStoreConfig(
  options: LoadStoreConfigOptions = {},
): Promise<StoreConfig> {
  const sources = options.sources ?? [new EnvSource({ prefix: DEFAULT_ENV_PREFIX })]
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = storeConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new ConfigurationError(
      `Store configuration validation failed:\n${z.prettifyError(result.error)}`,
      {
        cause: result.error,
        context: {
          issues: result.error.issues.map((i) => ({
            path: i.path.map(String).join("."),
            message: i.message,
            source: provenance[String(i.path[0])] ?? "default",
          })),
        },
      },
    )
  }

  return result.data
}
