import { describe, it, expect } from "vitest"
import { Ok, Err, tryCatchWith, partition, type Result } from "./result"

describe("Result", () => {
  it("Ok and Err carry their payloads", () => {
    expect(Ok(3)).toEqual({ ok: true, value: 3 })
    expect(Err("no text")).toEqual({ ok: false, error: "no text" })
  })

  describe("tryCatchWith", () => {
    it("wraps resolved values", async () => {
      const result = await tryCatchWith(
        async () => "page text",
        () => "mapped"
      )
      expect(result).toEqual({ ok: true, value: "page text" })
    })

    it("maps thrown errors", async () => {
      const result = await tryCatchWith(
        async () => {
          throw new Error("worker crashed")
        },
        (e) => (e instanceof Error ? e.message : "unknown")
      )
      expect(result).toEqual({ ok: false, error: "worker crashed" })
    })
  })

  it("partition keeps order within each side", () => {
    const results: Result<number, string>[] = [Ok(1), Err("a"), Ok(2), Err("b")]

    expect(partition(results)).toEqual({ values: [1, 2], errors: ["a", "b"] })
  })
})
