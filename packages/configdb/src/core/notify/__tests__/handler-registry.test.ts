import type { ChangeHandler } from "../../../ports/change-handler"
import { HandlerRegistry } from "../handler-registry"

describe("HandlerRegistry", () => {
  const first: ChangeHandler = () => {}
  const second: ChangeHandler = () => {}

  it("keeps several handlers per table, case-insensitively", () => {
    const handlers = new HandlerRegistry()

    handlers.add("port", first)
    handlers.add("PORT", second)

    expect(handlers.has("Port")).toBe(true)
    expect(handlers.handlersFor("PORT")).toStrictEqual([first, second])
  })

  it("the returned function removes only its own registration", () => {
    const handlers = new HandlerRegistry()
    const remove = handlers.add("PORT", first)
    handlers.add("PORT", second)

    remove()

    expect(handlers.handlersFor("PORT")).toStrictEqual([second])
  })

  it("remove without a handler clears the table", () => {
    const handlers = new HandlerRegistry()
    handlers.add("PORT", first)
    handlers.add("PORT", second)

    handlers.remove("port")

    expect(handlers.has("PORT")).toBe(false)
    expect(handlers.handlersFor("PORT")).toStrictEqual([])
  })

  it("drops a table once its last handler is removed", () => {
    const handlers = new HandlerRegistry()
    handlers.add("VLAN", first)

    handlers.remove("VLAN", first)

    expect(handlers.has("VLAN")).toBe(false)
  })

  it("hands out a snapshot", () => {
    const handlers = new HandlerRegistry()
    handlers.add("PORT", first)

    const snapshot = handlers.handlersFor("PORT")
    handlers.add("PORT", second)
    handlers.clear()

    expect(snapshot).toStrictEqual([first])
    expect(handlers.has("PORT")).toBe(false)
  })
})
