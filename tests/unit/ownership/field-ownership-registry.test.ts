import { describe, it, expect } from 'vitest'
import {
  FieldOwnershipRegistry,
  isEmptyValue,
  parseOwnershipTable,
} from '../../../src/ownership/field-ownership-registry.js'
import { ENTITY_TYPES } from '../../../src/ownership/types.js'
import { ConfigurationError } from '../../../src/utils/errors.js'

function rawTable(): Record<string, Record<string, unknown>> {
  return Object.fromEntries(
    ENTITY_TYPES.map((entityType) => [entityType, { defaultOwner: 'salesforce', fields: {} }])
  )
}

describe('FieldOwnershipRegistry', () => {
  const registry = FieldOwnershipRegistry.fromDefaultTable()

  describe('bundled table', () => {
    it('keeps publishing fields away from the CRM', () => {
      expect(registry.decide('event', 'publicVisibility', 'salesforce', { format: 'in_person' })).toEqual({
        action: 'preserve',
        owner: 'voluntech',
        rule: 'publicVisibility',
      })
      expect(registry.decide('event', 'districtIds', 'voluntech', { format: 'in_person' })).toEqual({
        action: 'overwrite',
        owner: 'voluntech',
        rule: 'districtIds',
      })
    })

    it('gives event core fields to the system of record for the format', () => {
      expect(registry.ownerOf('event', 'title', { format: 'virtual' })).toBe('pathful')
      expect(registry.ownerOf('event', 'title', { format: 'in_person' })).toBe('salesforce')
      expect(registry.ownerOf('event', 'title', null)).toBe('salesforce')
    })

    it('keeps staff tags on virtual sessions', () => {
      expect(registry.decide('event', 'presenterVolunteerId', 'pathful', { format: 'virtual' })).toEqual({
        action: 'preserve',
        owner: 'polaris',
        rule: 'presenterVolunteerId',
      })
    })

    it('lets listed sources fill empty teacher fields', () => {
      expect(registry.decide('teacher', 'contact.emails', 'pathful', {})).toEqual({
        action: 'fill',
        owner: 'roster',
        rule: 'contact.emails',
      })
    })

    it('keeps manual roster links over re-imports', () => {
      expect(registry.decide('teacherProgress', 'teacherId', 'roster', {})).toMatchObject({
        action: 'fill',
        owner: 'polaris',
      })
    })

    it('falls back to the entity default owner', () => {
      expect(registry.decide('organization', 'name', 'salesforce', {})).toEqual({
        action: 'overwrite',
        owner: 'salesforce',
        rule: '*',
      })
      expect(registry.decide('organization', 'name', 'pathful', {}).action).toBe('preserve')
    })

    it('lists every explicit rule', () => {
      expect(registry.describe()).toContainEqual(
        expect.objectContaining({ entityType: 'volunteer', field: 'localStatus' })
      )
    })
  })

  describe('ruleFor', () => {
    it('prefers the longest matching dot-prefix', () => {
      const raw = rawTable()
      raw.volunteer = {
        defaultOwner: 'salesforce',
        fields: { contact: { owner: 'polaris' }, 'contact.emails': { owner: 'salesforce' } },
      }
      const custom = new FieldOwnershipRegistry(parseOwnershipTable(raw))

      expect(custom.ruleFor('volunteer', 'contact.firstName')).toEqual({
        key: 'contact',
        rule: { owner: 'polaris' },
      })
      expect(custom.ruleFor('volunteer', 'contact.emails')?.key).toBe('contact.emails')
      expect(custom.ruleFor('volunteer', 'skills')).toBeNull()
    })
  })

  describe('parseOwnershipTable', () => {
    it('rejects a table that is not an object', () => {
      expect(() => parseOwnershipTable(['volunteer'])).toThrow('Ownership table must be an object')
    })

    it('requires an entry for every entity type', () => {
      const raw = rawTable()
      delete raw.event

      expect(() => parseOwnershipTable(raw)).toThrow("Ownership table has no entry for 'event'")
    })

    it('rejects unknown source systems', () => {
      const raw = rawTable()
      raw.volunteer = { defaultOwner: 'hubspot' }

      expect(() => parseOwnershipTable(raw)).toThrow(ConfigurationError)
      expect(() => parseOwnershipTable(raw)).toThrow(
        "Unknown source system 'hubspot' at volunteer.defaultOwner"
      )
    })

    it('rejects a conditional owner without cases', () => {
      const raw = rawTable()
      raw.event = { defaultOwner: 'salesforce', fields: { title: { owner: { byField: 'format' } } } }

      expect(() => parseOwnershipTable(raw)).toThrow(
        "Conditional owner at event.title.owner needs 'byField' and 'cases'"
      )
    })

    it('rejects a fillIfEmpty that is not a list', () => {
      const raw = rawTable()
      raw.teacher = {
        defaultOwner: 'roster',
        fields: { schoolId: { owner: 'salesforce', fillIfEmpty: 'roster' } },
      }

      expect(() => parseOwnershipTable(raw)).toThrow("'fillIfEmpty' at teacher.schoolId must be a list")
    })
  })
})

describe('isEmptyValue', () => {
  it('treats null, undefined, blank strings and empty lists as empty', () => {
    expect(isEmptyValue(null)).toBe(true)
    expect(isEmptyValue(undefined)).toBe(true)
    expect(isEmptyValue('')).toBe(true)
    expect(isEmptyValue([])).toBe(true)
  })

  it('keeps falsy scalars', () => {
    expect(isEmptyValue(0)).toBe(false)
    expect(isEmptyValue(false)).toBe(false)
    expect(isEmptyValue(' ')).toBe(false)
  })
})
