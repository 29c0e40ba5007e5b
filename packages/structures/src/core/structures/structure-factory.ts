import type { Logger } from "@qredis/logger"
import type { ListStore } from "../../ports/list-store"
import type { NameGenerator } from "../../ports/name-generator"
import type { Structure } from "../../ports/structure"
import { ConfigurationError } from "../errors/errors"
import { SequentialNameGenerator } from "../naming/sequential-name-generator"
import { verifyLiveness } from "./create-structure"
import { Queue } from "./queue"
import { Stack } from "./stack"
import { isStructureKind } from "./structure-key"

export type StructureFactoryDeps = {
  store: ListStore
  logger?: Logger

  /** Source of default names. Defaults to a counter owned by this factory. */
  names?: NameGenerator
}

export type StructureNameOptions = {
  name?: string
  namespace?: string
}

/**
 * Loosely typed construction request, e.g. read from a config file.
 */
export type StructureSpec = StructureNameOptions & {
  kind?: string
}

/**
 * Creates structures over one store, checking liveness before each one and
 * filling in names the caller leaves out.
 */
export class StructureFactory {
  private readonly names: NameGenerator

  public constructor(private readonly deps: StructureFactoryDeps) {
    this.names = deps.names ?? new SequentialNameGenerator()
  }

  async queue(opts: StructureNameOptions = {}): Promise<Queue> {
    await verifyLiveness(this.deps.store, this.deps.logger)

    return new Queue(this.structureDeps(), {
      name: opts.name ?? this.names.next("queue"),
      ...(opts.namespace !== undefined && { namespace: opts.namespace }),
    })
  }

  async stack(opts: StructureNameOptions = {}): Promise<Stack> {
    await verifyLiveness(this.deps.store, this.deps.logger)

    return new Stack(this.structureDeps(), {
      name: opts.name ?? this.names.next("stack"),
      ...(opts.namespace !== undefined && { namespace: opts.namespace }),
    })
  }

  /**
   * @throws ConfigurationError when `kind` is missing or not a known kind.
   */
  async create(spec: StructureSpec): Promise<Structure<string>> {
    const { kind, ...nameOpts } = spec

    if (kind === undefined) {
      throw new ConfigurationError("Structure kind is required", { context: { ...spec } })
    }

    if (!isStructureKind(kind)) {
      throw new ConfigurationError(`Unknown structure kind "${kind}"`, {
        context: { ...spec },
      })
    }

    return kind === "queue" ? await this.queue(nameOpts) : await this.stack(nameOpts)
  }

  private structureDeps(): { store: ListStore; logger?: Logger } {
    return {
      store: this.deps.store,
      ...(this.deps.logger && { logger: this.deps.logger }),
    }
  }
}
