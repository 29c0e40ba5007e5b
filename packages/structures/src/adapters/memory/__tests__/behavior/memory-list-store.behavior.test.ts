import { createTestListStore } from "../../../../tests/utils/structure-test-helpers"
import { createMemoryListStore } from "../../create"

describe("MemoryListStore (behavior)", () => {
  describe("blocking pops", () => {
    it("wait for the full timeout before giving up", async () => {
      const { store, clock } = createTestListStore(10)

      const res = await store.blockingPopLeft("queue:slow", 100)

      expect(res).toBeNull()
      expect(clock.nowMs()).toBe(100)
    })

    it("a zero timeout is a single attempt", async () => {
      const { store, clock } = createTestListStore(10)

      expect(await store.blockingPopRight("stack:now", 0)).toBeNull()
      expect(clock.nowMs()).toBe(0)
    })

    it("picks up a value pushed while waiting", async () => {
      const store = createMemoryListStore({ pollMs: 5 })

      const waiting = store.blockingPopLeft("queue:late", 2000)
      await store.pushRight("queue:late", "arrived")

      expect(await waiting).toBe("arrived")
      expect(await store.length("queue:late")).toBe(0)
    })

    it("waits without a timeout until a value arrives", async () => {
      const store = createMemoryListStore({ pollMs: 5 })

      const waiting = store.blockingPopRight("stack:forever")
      setTimeout(() => {
        void store.pushRight("stack:forever", "eventually")
      }, 20)

      expect(await waiting).toBe("eventually")
    })
  })

  describe("snapshot", () => {
    it("returns a copy of the list from left to right", async () => {
      const { store } = createTestListStore()

      await store.pushRight("queue:s", "1")
      await store.pushRight("queue:s", "2")

      const snap = store.snapshot("queue:s")
      snap.push("3")

      expect(store.snapshot("queue:s")).toStrictEqual(["1", "2"])
    })

    it("is empty for a drained key", async () => {
      const { store } = createTestListStore()

      await store.pushRight("queue:s", "1")
      await store.popLeft("queue:s")

      expect(store.snapshot("queue:s")).toStrictEqual([])
    })
  })
})
