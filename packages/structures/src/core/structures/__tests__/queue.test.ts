import { describeStructureContract } from "../../../ports/__tests__/structure.contract"
import { createTestListStore, items } from "../../../tests/utils/structure-test-helpers"
import { Queue } from "../queue"

describeStructureContract("Queue", async () => new Queue({ store: createTestListStore().store }, { name: "contract" }))

describe("Queue", () => {
  it("is keyed under the queue namespace by default", () => {
    const queue = new Queue({ store: createTestListStore().store }, { name: "jobs" })

    expect(queue.key).toBe("queue:jobs")
    expect(queue.kind).toBe("queue")
  })

  it("uses a custom namespace when given", () => {
    const queue = new Queue({ store: createTestListStore().store }, { name: "jobs", namespace: "billing" })

    expect(queue.key).toBe("billing:jobs")
  })

  it("returns items in insertion order", async () => {
    const queue = new Queue({ store: createTestListStore().store }, { name: "fifo" })

    await queue.put(items.a())
    await queue.put(items.b())
    await queue.put(items.c())

    expect(await queue.get({ block: false })).toStrictEqual({ kind: "found", value: "alpha" })
    expect(await queue.get({ block: false })).toStrictEqual({ kind: "found", value: "bravo" })
    expect(await queue.get({ block: false })).toStrictEqual({ kind: "found", value: "charlie" })
  })

  it("tracks size through puts and gets", async () => {
    const queue = new Queue({ store: createTestListStore().store }, { name: "t1" })

    await queue.put("x")
    await queue.put("y")
    expect(await queue.size()).toBe(2)

    expect(await queue.get()).toStrictEqual({ kind: "found", value: "x" })
    expect(await queue.size()).toBe(1)

    expect(await queue.get()).toStrictEqual({ kind: "found", value: "y" })
    expect(await queue.empty()).toBe(true)
  })

  it("writes to the store list at its key", async () => {
    const { store } = createTestListStore()
    const queue = new Queue({ store }, { name: "raw" })

    await queue.put("one")
    await queue.put("two")

    expect(store.snapshot("queue:raw")).toStrictEqual(["one", "two"])
  })

  it("a zero timeout does not wait", async () => {
    const { store, clock } = createTestListStore()
    const queue = new Queue({ store }, { name: "zero" })

    const res = await queue.get({ block: true, timeoutMs: 0 })

    expect(res).toStrictEqual({ kind: "empty" })
    expect(clock.nowMs()).toBe(0)
  })

  it("a blocking get waits out its timeout", async () => {
    const { store, clock } = createTestListStore(10)
    const queue = new Queue({ store }, { name: "wait" })

    const res = await queue.get({ timeoutMs: 50 })

    expect(res).toStrictEqual({ kind: "empty" })
    expect(clock.nowMs()).toBe(50)
  })

  it("rejects an empty name", () => {
    expect(() => new Queue({ store: createTestListStore().store }, { name: "" })).toThrow(
      "Structure name must not be empty",
    )
  })
})
