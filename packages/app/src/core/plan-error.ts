import { Match } from "effect"

export interface NameCollision {
  readonly _tag: "NameCollision"
  readonly name: string
}

export interface AmbiguousRename {
  readonly _tag: "AmbiguousRename"
  readonly name: string
}

export interface UnknownOrDuplicateId {
  readonly _tag: "UnknownOrDuplicateId"
  readonly experienceId: string
}

export interface UnknownManagedTag {
  readonly _tag: "UnknownManagedTag"
  readonly tag: string
}

export interface UnknownTag {
  readonly _tag: "UnknownTag"
  readonly tag: string
}

export interface UnknownSystem {
  readonly _tag: "UnknownSystem"
  readonly system: string
}

export interface UnknownTestSuite {
  readonly _tag: "UnknownTestSuite"
  readonly testSuite: string
}

export interface TestSuiteReferencesMissingExperience {
  readonly _tag: "TestSuiteReferencesMissingExperience"
  readonly testSuite: string
  readonly experience: string
}

export type PlanError =
  | NameCollision
  | AmbiguousRename
  | UnknownOrDuplicateId
  | UnknownManagedTag
  | UnknownTag
  | UnknownSystem
  | UnknownTestSuite
  | TestSuiteReferencesMissingExperience

export const nameCollision = (name: string): PlanError => ({ _tag: "NameCollision", name })

export const ambiguousRename = (name: string): PlanError => ({ _tag: "AmbiguousRename", name })

export const unknownOrDuplicateId = (experienceId: string): PlanError => ({
  _tag: "UnknownOrDuplicateId",
  experienceId
})

export const unknownManagedTag = (tag: string): PlanError => ({ _tag: "UnknownManagedTag", tag })

export const unknownTag = (tag: string): PlanError => ({ _tag: "UnknownTag", tag })

export const unknownSystem = (system: string): PlanError => ({ _tag: "UnknownSystem", system })

export const unknownTestSuite = (testSuite: string): PlanError => ({
  _tag: "UnknownTestSuite",
  testSuite
})

export const testSuiteReferencesMissingExperience = (
  testSuite: string,
  experience: string
): PlanError => ({
  _tag: "TestSuiteReferencesMissingExperience",
  testSuite,
  experience
})

// CHANGE: render planner rejections for the terminal
// WHY: every rejection names the offending entity
// PURITY: CORE
// INVARIANT: output mentions the name or id carried by the error
// COMPLEXITY: O(1)/O(1)
export const describePlanError = (error: PlanError): string =>
  Match.value(error).pipe(
    Match.tag("NameCollision", (e) => `Experience name collision: ${e.name}`),
    Match.tag(
      "AmbiguousRename",
      (e) => `Multiple experiences desire the same name: ${e.name}`
    ),
    Match.tag(
      "UnknownOrDuplicateId",
      (e) =>
        `No existing experience available with ID ${e.experienceId}; it never existed or is claimed by another configured experience`
    ),
    Match.tag("UnknownManagedTag", (e) => `Managed tag doesn't exist: ${e.tag}`),
    Match.tag("UnknownTag", (e) => `Non-existent tag: ${e.tag}`),
    Match.tag("UnknownSystem", (e) => `Non-existent system: ${e.system}`),
    Match.tag("UnknownTestSuite", (e) => `Test suite not found: ${e.testSuite}`),
    Match.tag(
      "TestSuiteReferencesMissingExperience",
      (e) => `Experience in test suite ${e.testSuite} not found or archived: ${e.experience}`
    ),
    Match.exhaustive
  )
