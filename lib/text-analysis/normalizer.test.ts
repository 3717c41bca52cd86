import { describe, it, expect } from "vitest"
import { HOUSEHOLD_SUPPORT_ACT } from "@/lib/sample-acts"
import { DEFAULT_ANALYSIS_CONFIG as config } from "./config"
import { collapseWhitespace, normalizeText } from "./normalizer"

describe("normalizeText", () => {
  it("repairs hyphenated line breaks", () => {
    expect(normalizeText(["The pay-\nment is due."], config)).toBe("The payment is due.")
  })

  it("joins a line ending in a continuation word", () => {
    expect(normalizeText(["A person is entitled to\nHousehold Support."], config)).toBe(
      "A person is entitled to Household Support."
    )
    expect(normalizeText(["The award is paid by the\nSecretary of State."], config)).toBe(
      "The award is paid by the Secretary of State."
    )
  })

  it("joins when the next line starts lowercase", () => {
    expect(normalizeText(["Payable in full\nwithin one month."], config)).toBe(
      "Payable in full within one month."
    )
  })

  it("joins after a trailing comma", () => {
    expect(normalizeText(["First,\nSecond."], config)).toBe("First, Second.")
  })

  it("keeps a break after terminal punctuation", () => {
    expect(normalizeText(["This Act applies.\nthen more text"], config)).toBe(
      "This Act applies.\nthen more text"
    )
  })

  it("keeps headings on their own lines", () => {
    expect(normalizeText(["PART 1\nENTITLEMENT"], config)).toBe("PART 1\nENTITLEMENT")
  })

  it("collapses inline whitespace and trims lines", () => {
    expect(normalizeText(["  The   award \t is  paid.  "], config)).toBe("The award is paid.")
  })

  it("handles CRLF line endings", () => {
    expect(normalizeText(["First line.\r\nSecond line."], config)).toBe(
      "First line.\nSecond line."
    )
  })

  it("keeps a blank line as a paragraph break even where a wrap would join", () => {
    expect(
      normalizeText(["The Secretary of State may by\n\nregulations make provision."], config)
    ).toBe("The Secretary of State may by\nregulations make provision.")
  })

  it("keeps a page boundary as a paragraph break", () => {
    expect(normalizeText(["The award is paid by the", "Secretary of State."], config)).toBe(
      "The award is paid by the\nSecretary of State."
    )
  })

  it("repairs hyphenation across blank lines and pages", () => {
    expect(normalizeText(["The pay-\n\nment is due."], config)).toBe("The payment is due.")
    expect(normalizeText(["The pay-", "ment is due."], config)).toBe("The payment is due.")
  })

  it("skips empty pages and treats page ends as line breaks", () => {
    expect(normalizeText(["Page one text.", "", "   ", "Page two text."], config)).toBe(
      "Page one text.\nPage two text."
    )
  })

  it("collapses runs of blank lines into one break", () => {
    expect(normalizeText(["A heading\n\n\n\nBody Text"], config)).toBe("A heading\nBody Text")
  })

  it("returns an empty string when there is no text", () => {
    expect(normalizeText([], config)).toBe("")
    expect(normalizeText(["  \n\t\n"], config)).toBe("")
  })

  it("never emits a blank line", () => {
    const text = normalizeText(HOUSEHOLD_SUPPORT_ACT.pages, config)
    expect(text).not.toContain("\n\n")
    expect(text).toContain("the balance of the maximum amount")
  })

  it("is idempotent", () => {
    const once = normalizeText(HOUSEHOLD_SUPPORT_ACT.pages, config)
    expect(normalizeText([once], config)).toBe(once)
  })
})

describe("collapseWhitespace", () => {
  it("normalizes a single string", () => {
    expect(collapseWhitespace("a  b\n\nc", config)).toBe("a b\nc")
    expect(collapseWhitespace("a  b\nc", config)).toBe("a b c")
  })
})
