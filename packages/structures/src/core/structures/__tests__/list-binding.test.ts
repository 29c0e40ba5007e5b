import { mock } from "vitest-mock-extended"
import type { ListStore } from "../../../ports/list-store"
import type { Mock } from "../../../tests/mock"
import { ListBinding } from "../list-binding"

describe("ListBinding", () => {
  let store: Mock<ListStore>
  let list: ListBinding

  beforeEach(() => {
    store = mock<ListStore>()
    list = new ListBinding({ store }, { kind: "queue", name: "jobs" })
  })

  it("blocks without a timeout by default", async () => {
    store.blockingPopLeft.mockResolvedValue("v")

    expect(await list.pop("left")).toStrictEqual({ kind: "found", value: "v" })
    expect(store.blockingPopLeft).toHaveBeenCalledExactlyOnceWith("queue:jobs", undefined)
  })

  it("forwards the timeout to the blocking pop", async () => {
    store.blockingPopRight.mockResolvedValue(null)

    expect(await list.pop("right", { timeoutMs: 250 })).toStrictEqual({ kind: "empty" })
    expect(store.blockingPopRight).toHaveBeenCalledExactlyOnceWith("queue:jobs", 250)
  })

  it("uses an immediate pop when not blocking", async () => {
    store.popLeft.mockResolvedValue(null)

    await list.pop("left", { block: false, timeoutMs: 1000 })

    expect(store.popLeft).toHaveBeenCalledExactlyOnceWith("queue:jobs")
    expect(store.blockingPopLeft).not.toHaveBeenCalled()
  })

  it("treats a zero timeout as an immediate pop", async () => {
    store.popRight.mockResolvedValue("top")

    expect(await list.pop("right", { block: true, timeoutMs: 0 })).toStrictEqual({
      kind: "found",
      value: "top",
    })
    expect(store.blockingPopRight).not.toHaveBeenCalled()
  })

  it("rejects an invalid timeout before touching the store", async () => {
    await expect(list.pop("left", { timeoutMs: Number.NaN })).rejects.toThrow(RangeError)

    expect(store.blockingPopLeft).not.toHaveBeenCalled()
  })

  it("empty() reflects the store length", async () => {
    store.length.mockResolvedValueOnce(0).mockResolvedValueOnce(4)

    expect(await list.empty()).toBe(true)
    expect(await list.empty()).toBe(false)
    expect(store.length).toHaveBeenCalledWith("queue:jobs")
  })
})
