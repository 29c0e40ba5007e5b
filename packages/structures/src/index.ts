export {
  createMemoryListStore,
  createMemoryStructures,
  type MemoryListStoreBundleOptions,
} from "./adapters/memory/create"
export { MemoryListStore, type MemoryListStoreOptions } from "./adapters/memory/memory-list-store"
export {
  connectRedisStructures,
  type RedisStructures,
  type RedisStructuresDeps,
  toRedisClientOptions,
} from "./adapters/redis/create"
export {
  createRedisListClient,
  type RedisListClient,
  type RedisListClientOptions,
} from "./adapters/redis/redis-client"
export { RedisListStore, type RedisListStoreOptions } from "./adapters/redis/redis-list-store"
export type { ConfigSource } from "./core/config/config-source"
export { EnvSource, type EnvSourceOptions } from "./core/config/env-source"
export { ObjectSource } from "./core/config/object-source"
export {
  DEFAULT_ENV_PREFIX,
  loadStoreConfig,
  type LoadStoreConfigOptions,
  type StoreConfig,
  storeConfigSchema,
} from "./core/config/store-config"
export {
  CompressionEncoder,
  type CompressionEncoderOptions,
  compressionEncoder,
} from "./core/encoding/compression-encoder"
export { EncodingStructure, type EncodingStructureDeps, withEncoding } from "./core/encoding/encoding-structure"
export { JsonEncoder, jsonEncoder } from "./core/encoding/json-encoder"
export { type JsonValue, jsonValueSchema } from "./core/encoding/json-value"
export {
  ConfigurationError,
  ConnectivityError,
  DecodingError,
  EncodingError,
  isStructureError,
  ParseError,
  RoutingIndexError,
  type StructureErrorCode,
} from "./core/errors/errors"
export { type HashFn, hash32, hashItem } from "./core/multi/hash"
export {
  createMultiStructure,
  MultiStructure,
  type MultiStructureOptions,
  type OrderedMultiStructureOptions,
  type UnorderedMultiStructureOptions,
} from "./core/multi/multi-structure"
export { SequentialNameGenerator } from "./core/naming/sequential-name-generator"
export { uuidNameGenerator } from "./core/naming/uuid-name-generator"
export {
  type CreateStructureOptions,
  createQueue,
  createStack,
  verifyLiveness,
} from "./core/structures/create-structure"
export { Queue, type QueueConfig } from "./core/structures/queue"
export { Stack, type StackConfig } from "./core/structures/stack"
export { formatStructureKey } from "./core/structures/structure-key"
export {
  StructureFactory,
  type StructureFactoryDeps,
  type StructureNameOptions,
  type StructureSpec,
} from "./core/structures/structure-factory"
export { type Clock, SystemClock } from "./core/time/clock"
export type { Encoder } from "./ports/encoder"
export type { ListKey, ListStore } from "./ports/list-store"
export type { NameGenerator } from "./ports/name-generator"
export type { GetOptions, GetResult, Structure, StructureKind } from "./ports/structure"
export type { Milliseconds } from "./ports/time"
