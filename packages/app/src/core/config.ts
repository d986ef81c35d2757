import * as Schema from "@effect/schema/Schema"
import { Either } from "effect"

import type { CustomField, EnvironmentVariable, Experience, SyncConfig } from "./experience.js"
import { makeExperience } from "./experience.js"

export interface ParseError {
  readonly _tag: "ParseError"
  readonly path: string
  readonly reason: string
}

export interface SchemaError {
  readonly _tag: "SchemaError"
  readonly path: string
  readonly reason: string
}

export interface DuplicateNameError {
  readonly _tag: "DuplicateNameError"
  readonly path: string
  readonly kind: "experience" | "test suite"
  readonly name: string
}

export type ConfigError = ParseError | SchemaError | DuplicateNameError

export const parseError = (path: string, reason: string): ConfigError => ({
  _tag: "ParseError",
  path,
  reason
})

export const schemaError = (path: string, reason: string): ConfigError => ({
  _tag: "SchemaError",
  path,
  reason
})

const duplicateNameError = (
  path: string,
  kind: DuplicateNameError["kind"],
  name: string
): ConfigError => ({
  _tag: "DuplicateNameError",
  path,
  kind,
  name
})

const EnvironmentVariableDocument = Schema.Struct({
  name: Schema.String,
  value: Schema.String
})

const CustomFieldDocument = Schema.Struct({
  name: Schema.String,
  type: Schema.Literal("text", "number", "timestamp", "json"),
  values: Schema.Array(Schema.String)
})

const ExperienceDocument = Schema.Struct({
  name: Schema.String,
  experience_id: Schema.optional(Schema.Union(Schema.UUID, Schema.Literal(""))),
  description: Schema.optional(Schema.String),
  locations: Schema.optional(Schema.Array(Schema.String)),
  profile: Schema.optional(Schema.String),
  environment_variables: Schema.optional(Schema.NullOr(Schema.Array(EnvironmentVariableDocument))),
  cache_exempt: Schema.optional(Schema.Boolean),
  container_timeout_seconds: Schema.optional(Schema.Int.pipe(Schema.positive())),
  custom_fields: Schema.optional(Schema.Array(CustomFieldDocument)),
  tags: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
  systems: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
  archived: Schema.optional(Schema.Boolean)
})

const ManagedTestSuiteDocument = Schema.Struct({
  name: Schema.String,
  experiences: Schema.optional(Schema.NullOr(Schema.Array(Schema.String)))
})

export const SyncConfigDocument = Schema.Struct({
  experiences: Schema.optional(Schema.NullOr(Schema.Array(ExperienceDocument))),
  managed_experience_tags: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
  managed_test_suites: Schema.optional(Schema.NullOr(Schema.Array(ManagedTestSuiteDocument)))
})

export type SyncConfigDocument = Schema.Schema.Type<typeof SyncConfigDocument>
type ExperienceDocument = Schema.Schema.Type<typeof ExperienceDocument>

const decodeDocument = Schema.decodeUnknownEither(SyncConfigDocument, {
  onExcessProperty: "error",
  errors: "first"
})

const uniqueInOrder = (values: ReadonlyArray<string>): ReadonlyArray<string> => [...new Set(values)]

const toExperience = (document: ExperienceDocument): Experience =>
  makeExperience({
    name: document.name.trim(),
    experienceId: document.experience_id === undefined || document.experience_id === ""
      ? undefined
      : document.experience_id,
    description: document.description ?? "",
    locations: document.locations ?? [],
    profile: document.profile,
    environmentVariables: document.environment_variables === null
      ? []
      : document.environment_variables,
    cacheExempt: document.cache_exempt ?? false,
    containerTimeoutSeconds: document.container_timeout_seconds,
    customFields: document.custom_fields,
    tags: uniqueInOrder(document.tags ?? []),
    systems: uniqueInOrder(document.systems ?? []),
    archived: document.archived ?? false
  })

const validateExperience = (path: string, experience: Experience): ConfigError | undefined => {
  if (experience.name.length === 0) {
    return schemaError(path, "Empty experience name")
  }
  if (experience.archived) {
    return undefined
  }
  if (experience.locations.length === 0) {
    return schemaError(path, `No locations provided for experience: ${experience.name}`)
  }
  return undefined
}

const firstDuplicate = (names: ReadonlyArray<string>): string | undefined => {
  const seen = new Set<string>()
  for (const name of names) {
    if (seen.has(name)) {
      return name
    }
    seen.add(name)
  }
  return undefined
}

/**
 * Decodes a parsed YAML document into a normalized SyncConfig.
 *
 * @param path - Source of the document, carried into errors.
 * @param document - Output of the YAML parser.
 * @returns Normalized configuration or the first structural problem.
 *
 * @pure true
 * @invariant names are trimmed and unique; tags and systems are duplicate-free
 * @complexity O(n) where n = size of the document
 */
// CHANGE: decode the experience configuration through a strict schema
// WHY: unknown keys and wrong types must fail before any API call
// FORMAT THEOREM: forall d: decode(d) = Right(cfg) -> unique(names(cfg))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: active experiences carry at least one location
// COMPLEXITY: O(n)/O(n)
export const decodeSyncConfig = (
  path: string,
  document: unknown
): Either.Either<SyncConfig, ConfigError> => {
  const decoded = decodeDocument(document)
  if (Either.isLeft(decoded)) {
    return Either.left(schemaError(path, decoded.left.message))
  }

  const experiences = (decoded.right.experiences ?? []).map(toExperience)
  for (const experience of experiences) {
    const invalid = validateExperience(path, experience)
    if (invalid !== undefined) {
      return Either.left(invalid)
    }
  }
  const duplicateExperience = firstDuplicate(experiences.map((experience) => experience.name))
  if (duplicateExperience !== undefined) {
    return Either.left(duplicateNameError(path, "experience", duplicateExperience))
  }

  const managedTestSuites = (decoded.right.managed_test_suites ?? []).map((suite) => ({
    name: suite.name.trim(),
    experiences: (suite.experiences ?? []).map((name) => name.trim())
  }))
  const duplicateSuite = firstDuplicate(managedTestSuites.map((suite) => suite.name))
  if (duplicateSuite !== undefined) {
    return Either.left(duplicateNameError(path, "test suite", duplicateSuite))
  }

  return Either.right({
    experiences,
    managedExperienceTags: uniqueInOrder(decoded.right.managed_experience_tags ?? []),
    managedTestSuites
  })
}

const encodeEnvironmentVariables = (
  variables: ReadonlyArray<EnvironmentVariable> | undefined
) => variables === undefined ? {} : { environment_variables: variables.map(({ name, value }) => ({ name, value })) }

const encodeCustomFields = (fields: ReadonlyArray<CustomField> | undefined) =>
  fields === undefined || fields.length === 0
    ? {}
    : { custom_fields: fields.map(({ name, type, values }) => ({ name, type, values })) }

const encodeExperience = (experience: Experience): ExperienceDocument => ({
  name: experience.name,
  ...(experience.experienceId === undefined ? {} : { experience_id: experience.experienceId }),
  description: experience.description,
  locations: experience.locations,
  ...(experience.profile === undefined || experience.profile === "" ? {} : { profile: experience.profile }),
  ...encodeEnvironmentVariables(experience.environmentVariables),
  ...(experience.cacheExempt ? { cache_exempt: true } : {}),
  ...(experience.containerTimeoutSeconds === undefined || experience.containerTimeoutSeconds <= 0
    ? {}
    : { container_timeout_seconds: experience.containerTimeoutSeconds }),
  ...encodeCustomFields(experience.customFields),
  ...(experience.tags.length === 0 ? {} : { tags: experience.tags }),
  ...(experience.systems.length === 0 ? {} : { systems: experience.systems }),
  ...(experience.archived ? { archived: true } : {})
})

// CHANGE: inverse of decodeSyncConfig for writing configuration files
// WHY: clone and update-config emit files the loader accepts unchanged
// FORMAT THEOREM: forall cfg: decode(encode(cfg)) = cfg modulo omitted defaults
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: default-valued keys are omitted
// COMPLEXITY: O(n)/O(n)
export const encodeSyncConfig = (config: SyncConfig): SyncConfigDocument => ({
  experiences: config.experiences.map(encodeExperience),
  ...(config.managedExperienceTags.length === 0
    ? {}
    : { managed_experience_tags: config.managedExperienceTags }),
  ...(config.managedTestSuites.length === 0
    ? {}
    : {
      managed_test_suites: config.managedTestSuites.map((suite) => ({
        name: suite.name,
        experiences: suite.experiences
      }))
    })
})
