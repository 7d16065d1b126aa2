/**
 * Table-driven field ownership: which source system may write which field
 * @module ownership/field-ownership-registry
 */

import { ConfigurationError } from '../utils/errors.js'
import { getPath, isPlainObject } from '../utils/paths.js'
import { SOURCE_SYSTEMS, type SourceSystem } from '../types/entities.js'
import defaultTable from './ownership-table.json'
import {
  ENTITY_TYPES,
  type ConditionalOwner,
  type EntityOwnership,
  type EntityType,
  type FieldRule,
  type OwnerSpec,
  type OwnershipDecision,
  type OwnershipTable,
} from './types.js'

function isSourceSystem(value: unknown): value is SourceSystem {
  return SOURCE_SYSTEMS.some((source) => source === value)
}

function parseSource(value: unknown, where: string): SourceSystem {
  if (!isSourceSystem(value)) {
    throw new ConfigurationError(
      `Unknown source system '${String(value)}' at ${where}`,
      where,
      { value }
    )
  }
  return value
}

function parseOwner(value: unknown, where: string): OwnerSpec {
  if (!isPlainObject(value)) {
    return parseSource(value, where)
  }
  const { byField, cases, fallback } = value
  if (typeof byField !== 'string' || !byField || !isPlainObject(cases)) {
    throw new ConfigurationError(
      `Conditional owner at ${where} needs 'byField' and 'cases'`,
      where
    )
  }
  const parsedCases: Partial<Record<string, SourceSystem>> = {}
  for (const [caseValue, owner] of Object.entries(cases)) {
    parsedCases[caseValue] = parseSource(owner, `${where}.cases.${caseValue}`)
  }
  const conditional: ConditionalOwner = {
    byField,
    cases: parsedCases,
    fallback: parseSource(fallback, `${where}.fallback`),
  }
  return conditional
}

function parseRule(value: unknown, where: string): FieldRule {
  if (!isPlainObject(value)) {
    throw new ConfigurationError(`Field rule at ${where} must be an object`, where)
  }
  const rule: FieldRule = { owner: parseOwner(value.owner, `${where}.owner`) }
  if (value.fillIfEmpty !== undefined) {
    if (!Array.isArray(value.fillIfEmpty)) {
      throw new ConfigurationError(`'fillIfEmpty' at ${where} must be a list`, where)
    }
    rule.fillIfEmpty = value.fillIfEmpty.map((source, i) =>
      parseSource(source, `${where}.fillIfEmpty[${i}]`)
    )
  }
  if (typeof value.note === 'string') {
    rule.note = value.note
  }
  return rule
}

function parseEntity(raw: Record<string, unknown>, entityType: EntityType): EntityOwnership {
  const entry = raw[entityType]
  if (!isPlainObject(entry)) {
    throw new ConfigurationError(
      `Ownership table has no entry for '${entityType}'`,
      entityType
    )
  }
  const fields: Record<string, FieldRule> = {}
  if (entry.fields !== undefined) {
    if (!isPlainObject(entry.fields)) {
      throw new ConfigurationError(`'${entityType}.fields' must be an object`, entityType)
    }
    for (const [path, rule] of Object.entries(entry.fields)) {
      fields[path] = parseRule(rule, `${entityType}.${path}`)
    }
  }
  return {
    defaultOwner: parseSource(entry.defaultOwner, `${entityType}.defaultOwner`),
    fields,
  }
}

/**
 * Validates a raw ownership table (usually parsed JSON). Every entity type
 * must have an entry and every owner must be a known source system.
 *
 * @throws {ConfigurationError} on the first problem found
 */
export function parseOwnershipTable(raw: unknown): OwnershipTable {
  if (!isPlainObject(raw)) {
    throw new ConfigurationError('Ownership table must be an object')
  }
  return {
    volunteer: parseEntity(raw, 'volunteer'),
    teacher: parseEntity(raw, 'teacher'),
    student: parseEntity(raw, 'student'),
    event: parseEntity(raw, 'event'),
    organization: parseEntity(raw, 'organization'),
    district: parseEntity(raw, 'district'),
    school: parseEntity(raw, 'school'),
    skill: parseEntity(raw, 'skill'),
    careerType: parseEntity(raw, 'careerType'),
    eventParticipation: parseEntity(raw, 'eventParticipation'),
    eventTeacher: parseEntity(raw, 'eventTeacher'),
    eventStudent: parseEntity(raw, 'eventStudent'),
    teacherProgress: parseEntity(raw, 'teacherProgress'),
  }
}

/**
 * True for values a `fillIfEmpty` source may replace
 */
export function isEmptyValue(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    value === '' ||
    (Array.isArray(value) && value.length === 0)
  )
}

/**
 * Single source of truth for field ownership.
 *
 * @example
 * ```typescript
 * const registry = FieldOwnershipRegistry.fromDefaultTable()
 * registry.decide('event', 'publicVisibility', 'salesforce', storedEvent)
 * // { action: 'preserve', owner: 'voluntech', rule: 'publicVisibility' }
 * ```
 */
export class FieldOwnershipRegistry {
  constructor(private readonly table: OwnershipTable) {}

  /**
   * Registry over the bundled `ownership-table.json`
   */
  static fromDefaultTable(): FieldOwnershipRegistry {
    return new FieldOwnershipRegistry(parseOwnershipTable(defaultTable))
  }

  /**
   * Finds the rule for a field: the exact path, else the longest rule key
   * that is a dot-prefix of it.
   */
  ruleFor(entityType: EntityType, field: string): { key: string; rule: FieldRule } | null {
    const fields = this.table[entityType].fields
    let key = field
    for (;;) {
      const rule = fields[key]
      if (rule) return { key, rule }
      const dot = key.lastIndexOf('.')
      if (dot < 0) return null
      key = key.slice(0, dot)
    }
  }

  /**
   * Resolves the owner of a field for one stored record
   */
  ownerOf(entityType: EntityType, field: string, existing: object | null): SourceSystem {
    const match = this.ruleFor(entityType, field)
    if (!match) return this.table[entityType].defaultOwner
    return this.resolveOwner(match.rule.owner, existing)
  }

  /**
   * Decides what an update from `source` may do to `field` of `existing`.
   * Creation is not decided here; a new entity takes every incoming field.
   */
  decide(
    entityType: EntityType,
    field: string,
    source: SourceSystem,
    existing: object
  ): OwnershipDecision {
    const match = this.ruleFor(entityType, field)
    const rule = match?.key ?? '*'
    const owner = match
      ? this.resolveOwner(match.rule.owner, existing)
      : this.table[entityType].defaultOwner

    if (owner === source) {
      return { action: 'overwrite', owner, rule }
    }
    if (match?.rule.fillIfEmpty?.includes(source)) {
      return { action: 'fill', owner, rule }
    }
    return { action: 'preserve', owner, rule }
  }

  /**
   * Every explicit rule, flattened for audit listings
   */
  describe(): Array<{ entityType: EntityType; field: string; rule: FieldRule }> {
    return ENTITY_TYPES.flatMap((entityType) =>
      Object.entries(this.table[entityType].fields).map(([field, rule]) => ({
        entityType,
        field,
        rule,
      }))
    )
  }

  private resolveOwner(owner: OwnerSpec, existing: object | null): SourceSystem {
    if (typeof owner === 'string') return owner
    const value = existing ? getPath(existing, owner.byField) : undefined
    return (typeof value === 'string' ? owner.cases[value] : undefined) ?? owner.fallback
  }
}
