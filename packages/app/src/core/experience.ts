export type CustomFieldType = "text" | "number" | "timestamp" | "json"

export interface CustomField {
  readonly name: string
  readonly type: CustomFieldType
  readonly values: ReadonlyArray<string>
}

export interface EnvironmentVariable {
  readonly name: string
  readonly value: string
}

/**
 * A single experience, either as configured or as currently stored by the backend.
 *
 * Optional runtime fields stay `undefined` when the configuration omits them so the
 * applier can leave the stored value untouched.
 */
export interface Experience {
  readonly name: string
  // Assigned by the backend. The applier writes it exactly once, when a creation returns.
  experienceId: string | undefined
  readonly description: string
  readonly locations: ReadonlyArray<string>
  readonly profile: string | undefined
  readonly environmentVariables: ReadonlyArray<EnvironmentVariable> | undefined
  readonly cacheExempt: boolean
  readonly containerTimeoutSeconds: number | undefined
  readonly customFields: ReadonlyArray<CustomField> | undefined
  readonly tags: ReadonlyArray<string>
  readonly systems: ReadonlyArray<string>
  readonly archived: boolean
}

export interface ManagedTestSuite {
  readonly name: string
  readonly experiences: ReadonlyArray<string>
}

export interface SyncConfig {
  readonly experiences: ReadonlyArray<Experience>
  readonly managedExperienceTags: ReadonlyArray<string>
  readonly managedTestSuites: ReadonlyArray<ManagedTestSuite>
}

export interface TagSet {
  readonly name: string
  readonly tagId: string
  readonly experienceIds: ReadonlySet<string>
}

export interface SystemSet {
  readonly name: string
  readonly systemId: string
  readonly experienceIds: ReadonlySet<string>
}

export interface DatabaseState {
  readonly experiencesByName: ReadonlyMap<string, Experience>
  readonly tagSetsByName: ReadonlyMap<string, TagSet>
  readonly systemSetsByName: ReadonlyMap<string, SystemSet>
  readonly testSuiteIdsByName: ReadonlyMap<string, string>
}

// CHANGE: single constructor for experiences with the loader's defaults
// WHY: configuration, snapshot and tests share one shape with the same defaults
// PURITY: CORE
// INVARIANT: cacheExempt=false, archived=false, tags=[], systems=[] unless given
// COMPLEXITY: O(1)/O(1)
export const makeExperience = (
  fields: Pick<Experience, "name"> & Partial<Experience>
): Experience => ({
  experienceId: undefined,
  description: "",
  locations: [],
  profile: undefined,
  environmentVariables: undefined,
  cacheExempt: false,
  containerTimeoutSeconds: undefined,
  customFields: undefined,
  tags: [],
  systems: [],
  archived: false,
  ...fields
})

export const emptyDatabaseState: DatabaseState = {
  experiencesByName: new Map(),
  tagSetsByName: new Map(),
  systemSetsByName: new Map(),
  testSuiteIdsByName: new Map()
}
