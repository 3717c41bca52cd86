import { describe, it, expect } from "vitest"
import { HOUSEHOLD_SUPPORT_ACT } from "@/lib/sample-acts"
import { DEFAULT_ANALYSIS_CONFIG as config } from "./config"
import { normalizeText } from "./normalizer"
import { scoreSentence, splitSentences } from "./sentences"
import type { SentenceSpan } from "./types"

const texts = (text: string): string[] => splitSentences(text, config).map((s) => s.text)

const span = (text: string): SentenceSpan => ({ text, index: 0, start: 0, end: text.length })

describe("splitSentences", () => {
  it("does not split after a legal abbreviation", () => {
    expect(texts("See s. 12 of the Act. It applies.")).toEqual([
      "See s. 12 of the Act.",
      "It applies.",
    ])
  })

  it("treats No. as an abbreviation only before a number", () => {
    expect(texts("See Order No. 3 of 2031. It applies.")).toEqual([
      "See Order No. 3 of 2031.",
      "It applies.",
    ])
    expect(texts("The answer is no. The Secretary of State decides.")).toEqual([
      "The answer is no.",
      "The Secretary of State decides.",
    ])
  })

  it("does not split after a clause number", () => {
    expect(texts("1. The person must apply.")).toEqual(["1. The person must apply."])
  })

  it("does not split inside e.g.", () => {
    expect(texts("Use e.g. a form. Then stop.")).toEqual(["Use e.g. a form.", "Then stop."])
  })

  it("keeps closing quotes with their sentence", () => {
    expect(texts('He asked "Why?" Then left.')).toEqual(['He asked "Why?"', "Then left."])
  })

  it("needs a sentence start after the punctuation", () => {
    expect(texts("It ends. then more.")).toEqual(["It ends. then more."])
  })

  it("always splits on a newline", () => {
    expect(texts("Line one\nLine two")).toEqual(["Line one", "Line two"])
  })

  it("records offsets into the source text", () => {
    const text = normalizeText(HOUSEHOLD_SUPPORT_ACT.pages, config)
    const spans = splitSentences(text, config)

    expect(spans.length).toBeGreaterThan(10)
    spans.forEach((s, i) => {
      expect(s.index).toBe(i)
      expect(text.slice(s.start, s.end)).toBe(s.text)
    })
  })

  it("returns no spans for empty text", () => {
    expect(splitSentences("", config)).toEqual([])
  })
})

describe("scoreSentence", () => {
  it("adds weighted keyword, legal term, number and definition signals", () => {
    const scored = scoreSentence(
      span("The Secretary of State must pay £400."),
      [{ token: "pay", frequency: 3 }],
      config
    )

    expect(scored.components).toEqual({
      keywordHits: 1,
      legalTermHits: 2,
      hasNumber: true,
      isDefinition: false,
    })
    expect(scored.score).toBe(6)
  })

  it("scores a quoted definition", () => {
    const scored = scoreSentence(span('"Claimant" means a person who has made a claim.'), [], config)

    expect(scored.components.isDefinition).toBe(true)
    expect(scored.score).toBe(2)
  })

  it("scores a capitalised definition with a dash", () => {
    const scored = scoreSentence(span("Universal Credit — means a payment under this Act."), [], config)

    expect(scored.components).toEqual({
      keywordHits: 0,
      legalTermHits: 2,
      hasNumber: false,
      isDefinition: true,
    })
    expect(scored.score).toBe(6)
  })

  it("gives zero to a sentence with no signals", () => {
    expect(scoreSentence(span("Birds sing early every morning."), [], config).score).toBe(0)
  })
})
