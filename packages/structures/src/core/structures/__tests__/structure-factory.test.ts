import { mock } from "vitest-mock-extended"
import type { ListStore } from "../../../ports/list-store"
import type { NameGenerator } from "../../../ports/name-generator"
import { createTestListStore } from "../../../tests/utils/structure-test-helpers"
import { ConfigurationError, ConnectivityError } from "../../errors/errors"
import { StructureFactory } from "../structure-factory"

describe("StructureFactory", () => {
  let factory: StructureFactory

  beforeEach(() => {
    factory = new StructureFactory({ store: createTestListStore().store })
  })

  describe("default names", () => {
    it("counts up per kind", async () => {
      const q0 = await factory.queue()
      const q1 = await factory.queue()
      const s0 = await factory.stack()

      expect([q0.key, q1.key, s0.key]).toStrictEqual(["queue:0", "queue:1", "stack:0"])
    })

    it("does not consume a name when one is given", async () => {
      await factory.queue({ name: "jobs" })
      const next = await factory.queue()

      expect(next.key).toBe("queue:0")
    })

    it("keeps counters per factory", async () => {
      const other = new StructureFactory({ store: createTestListStore().store })

      await factory.queue()
      const fromOther = await other.queue()

      expect(fromOther.key).toBe("queue:0")
    })

    it("uses the injected generator", async () => {
      const names = mock<NameGenerator>()
      names.next.mockReturnValue("generated")
      const custom = new StructureFactory({ store: createTestListStore().store, names })

      const stack = await custom.stack({ namespace: "tmp" })

      expect(stack.key).toBe("tmp:generated")
      expect(names.next).toHaveBeenCalledExactlyOnceWith("stack")
    })
  })

  describe("create", () => {
    it("builds the requested kind", async () => {
      const queue = await factory.create({ kind: "queue", name: "a" })
      const stack = await factory.create({ kind: "stack", name: "b" })

      expect(queue.kind).toBe("queue")
      expect(queue.key).toBe("queue:a")
      expect(stack.kind).toBe("stack")
      expect(stack.key).toBe("stack:b")
    })

    it("requires a kind", async () => {
      const attempt = factory.create({ name: "orphan" })

      await expect(attempt).rejects.toBeInstanceOf(ConfigurationError)
      await expect(attempt).rejects.toThrow("Structure kind is required")
    })

    it("rejects an unknown kind", async () => {
      await expect(factory.create({ kind: "deque" })).rejects.toThrow(
        'Unknown structure kind "deque"',
      )
    })
  })

  it("checks liveness before each structure", async () => {
    const store = mock<ListStore>()
    store.ping.mockRejectedValue(new Error("down"))
    const offline = new StructureFactory({ store })

    await expect(offline.queue()).rejects.toBeInstanceOf(ConnectivityError)
    await expect(offline.stack({ name: "x" })).rejects.toBeInstanceOf(ConnectivityError)
  })
})
