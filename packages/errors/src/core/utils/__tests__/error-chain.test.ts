import { BaseError } from "../../base-error"
import { errorChain, findInChain } from "../error-chain"

class DeadlineError extends BaseError<"deadline_exceeded"> {}

describe("errorChain", () => {
  describe("basic chains", () => {
    it("returns single element for error without cause", () => {
      const err = new Error("solo")

      expect(errorChain(err)).toEqual([err])
    })

    it("returns the chain outermost first", () => {
      const root = new Error("root")
      const middle = new BaseError("middle", { code: "mid", cause: root })
      const outer = new Error("outer", { cause: middle })

      const chain = errorChain(outer)

      expect(chain).toHaveLength(3)
      expect(chain[0]).toBe(outer)
      expect(chain[1]).toBe(middle)
      expect(chain[2]).toBe(root)
    })

    it("includes non-Error causes", () => {
      const err = new Error("wrapper", { cause: "string cause" })

      expect(errorChain(err)).toEqual([err, "string cause"])
    })
  })

  describe("safety", () => {
    it("detects cycles", () => {
      const a = { cause: null as unknown, message: "a" }
      const b = { cause: a, message: "b" }
      a.cause = b

      const chain = errorChain(a)

      expect(chain).toHaveLength(2)
      expect(chain[0]).toBe(a)
      expect(chain[1]).toBe(b)
    })

    it("respects maxDepth", () => {
      let current: Error = new Error("root")
      for (let i = 0; i < 9; i++) {
        current = new Error(`level-${i}`, { cause: current })
      }

      expect(errorChain(current, 5)).toHaveLength(5)
      expect(errorChain(current)).toHaveLength(10)
    })
  })

  describe("edge cases", () => {
    it("returns an empty chain for null and undefined", () => {
      expect(errorChain(null)).toEqual([])
      expect(errorChain(undefined)).toEqual([])
    })

    it("handles string input", () => {
      expect(errorChain("just a string")).toEqual(["just a string"])
    })
  })
})

describe("findInChain", () => {
  const isDeadline = (v: unknown): v is DeadlineError => v instanceof DeadlineError

  it("finds a matching cause at any depth", () => {
    const deadline = new DeadlineError("too slow", { code: "deadline_exceeded" })
    const lookup = new BaseError("lookup failed", { code: "lookup_failed", cause: deadline })
    const batch = new BaseError("batch failed", { code: "batch_failed", cause: lookup })

    expect(findInChain(batch, isDeadline)).toBe(deadline)
  })

  it("returns the outermost match first", () => {
    const inner = new DeadlineError("inner", { code: "deadline_exceeded" })
    const outer = new DeadlineError("outer", { code: "deadline_exceeded", cause: inner })

    expect(findInChain(outer, isDeadline)).toBe(outer)
  })

  it("returns undefined when nothing matches", () => {
    const err = new Error("outer", { cause: new Error("inner") })

    expect(findInChain(err, isDeadline)).toBeUndefined()
  })
})
