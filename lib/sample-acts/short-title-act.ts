import type { SampleAct } from "./index"

export const SHORT_TITLE_ACT: SampleAct = {
  id: "short-title-act",
  title: "Short Title Act 2031",
  description:
    "A one-page Act with no obligations, payments or penalties. Most sections and rules come back empty.",
  expectedSections: [],
  pages: [
    `SHORT TITLE ACT 2031
1 Short title
This Act may be cited as the Short Title Act 2031.
2 Commencement
This Act comes into force on the day it is passed.`,
  ],
}
