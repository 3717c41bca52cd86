import type { SampleAct } from "./index"

export const HOUSEHOLD_SUPPORT_ACT: SampleAct = {
  id: "household-support-act",
  title: "Household Support Act 2031",
  description:
    "A four-page benefits Act with every section category present, a hyphenated line break, a definition list and a blank final page.",
  expectedSections: [
    "definitions",
    "obligations",
    "responsibilities",
    "eligibility",
    "payments",
    "penalties",
    "record_keeping",
  ],
  pages: [
    `HOUSEHOLD SUPPORT ACT 2031
PART 1
ENTITLEMENT
1 Household support
(1) A benefit known as household support is payable in accordance
with this Part.
(2) A person is entitled to household support if the person meets
the basic conditions and the financial conditions.
2 Basic conditions
(1) A person meets the basic conditions who is at least 18 years old,
is resident in the United Kingdom and is not receiving education.
(2) Regulations may provide for exceptions to the requirement to
meet any of the basic conditions.`,

    `PART 2
AWARDS AND PAYMENTS
3 Amount of an award
(1) The amount of an award of household support is to be the bal-
ance of the maximum amount less the amounts to be deducted.
(2) The standard allowance is £400 for each assessment period.
(3) The Secretary of State must pay the award monthly in arrears.
4 Interpretation
In this Act "assessment period" means a period of one month.
"Claimant" means a person who has made a claim for household support.`,

    `PART 3
ADMINISTRATION
5 Duties of the Secretary of State
(1) The Secretary of State must keep records of every award made
under this Act.
(2) A claimant must report any change of circumstances to the
Secretary of State within one month.
(3) The Secretary of State shall maintain documentation of each
decision and retain it for six years.
6 Penalties
(1) A person who makes a false statement to obtain an award commits an offence.
(2) A person guilty of an offence under this section is liable to a penalty
not exceeding £5,000.`,

    "",
  ],
}
