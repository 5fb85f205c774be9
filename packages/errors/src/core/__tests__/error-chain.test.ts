import { errorChain, findInChain } from "../error-chain"

class ReplyError extends Error {}

describe("errorChain", () => {
  it("returns the error and its causes in order", () => {
    const root = new Error("root")
    const mid = new Error("mid", { cause: root })
    const top = new Error("top", { cause: mid })

    expect(errorChain(top)).toEqual([top, mid, root])
  })

  it("stops on cycles", () => {
    const a: { cause?: unknown } = {}
    const b = { cause: a }
    a.cause = b

    expect(errorChain(a)).toHaveLength(2)
  })

  it("honours maxDepth", () => {
    let err = new Error("0")
    for (let i = 1; i < 10; i++) err = new Error(String(i), { cause: err })

    expect(errorChain(err, 3)).toHaveLength(3)
  })

  it("returns an empty chain for null", () => {
    expect(errorChain(null)).toEqual([])
  })
})

describe("findInChain", () => {
  it("finds a wrapped error by guard", () => {
    const reply = new ReplyError("WRONGTYPE")
    const wrapped = new Error("command failed", { cause: reply })

    expect(findInChain(wrapped, (e): e is ReplyError => e instanceof ReplyError)).toBe(reply)
  })

  it("returns undefined when nothing matches", () => {
    expect(findInChain(new Error("x"), (e): e is ReplyError => e instanceof ReplyError)).toBeUndefined()
  })
})
