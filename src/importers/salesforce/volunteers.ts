/**
 * Salesforce Contact → Volunteer import
 * @module importers/salesforce/volunteers
 */

import type { LocalityConfig } from '../../config/config.js'
import { normalizeEmail } from '../../core/normalizers/email.js'
import { toIsoDateTime } from '../../core/normalizers/date.js'
import { normalizePhones } from '../../core/normalizers/phone.js'
import type { SourceRowView } from '../../import/columns.js'
import type { ColumnSpec, ImportDefinition, RowContext } from '../../import/types.js'
import type { IncomingFields } from '../../merge/types.js'
import { deriveLocalStatus } from '../../status/local-status.js'
import type { Address, Volunteer } from '../../types/entities.js'
import {
  buildAddress,
  cacheKeys,
  mergeAndSave,
  newEntity,
  resolveUnique,
  rowKind,
} from '../shared.js'
import { splitMultiSelect } from './value-maps.js'

const EMAIL_FIELDS = [
  'Email',
  'npe01__WorkEmail__c',
  'npe01__HomeEmail__c',
  'npe01__AlternateEmail__c',
] as const

/** Preferred-email picklist value → field it selects */
const PREFERRED_EMAIL = new Map<string, (typeof EMAIL_FIELDS)[number]>([
  ['work', 'npe01__WorkEmail__c'],
  ['personal', 'npe01__HomeEmail__c'],
  ['alternate', 'npe01__AlternateEmail__c'],
])

const PHONE_FIELDS = ['Phone', 'MobilePhone', 'HomePhone', 'npe01__WorkPhone__c'] as const

const VOLUNTEER_COLUMNS: readonly ColumnSpec[] = [
  { key: 'Id', aliases: [], required: true },
  { key: 'FirstName', aliases: [] },
  { key: 'LastName', aliases: [], required: true },
  { key: 'MiddleName', aliases: [] },
  ...EMAIL_FIELDS.map((key) => ({ key, aliases: [] })),
  { key: 'npe01__Preferred_Email__c', aliases: [] },
  ...PHONE_FIELDS.map((key) => ({ key, aliases: [] })),
  { key: 'Title', aliases: [] },
  { key: 'npsp__Primary_Affiliation__c', aliases: [] },
  { key: 'AccountId', aliases: [] },
  { key: 'MailingStreet', aliases: [] },
  { key: 'MailingCity', aliases: [] },
  { key: 'MailingState', aliases: [] },
  { key: 'MailingPostalCode', aliases: [] },
  { key: 'Gender__c', aliases: [] },
  { key: 'Birthdate', aliases: [] },
  { key: 'Last_Volunteer_Date__c', aliases: [] },
  { key: 'Volunteer_Skills__c', aliases: [] },
]

export interface VolunteerImportOptions {
  locality?: LocalityConfig
}

/**
 * Emails on the row, preferred address first. Malformed addresses are left
 * out with a warning rather than failing the row.
 */
function collectEmails(row: SourceRowView, context: RowContext<null>): string[] {
  const preference = row.get('npe01__Preferred_Email__c')?.toLowerCase()
  const preferred = preference ? PREFERRED_EMAIL.get(preference) : undefined
  const fields = preferred
    ? [preferred, ...EMAIL_FIELDS.filter((field) => field !== preferred)]
    : EMAIL_FIELDS

  const emails: string[] = []
  for (const field of fields) {
    const raw = row.get(field)
    if (!raw) continue
    const email = normalizeEmail(raw)
    if (!email) {
      context.warn(`Ignored malformed ${field}: ${raw}`, context.rowNumber)
      continue
    }
    if (!emails.includes(email)) emails.push(email)
  }
  return emails
}

function mailingAddress(row: SourceRowView): Address | null {
  return buildAddress(
    {
      street: row.get('MailingStreet'),
      city: row.get('MailingCity'),
      state: row.get('MailingState'),
      zipCode: row.get('MailingPostalCode'),
    },
    'home',
    true
  )
}

function dateOnly(value: string | undefined): string | undefined {
  return toIsoDateTime(value)?.slice(0, 10)
}

/**
 * Volunteer import. Contacts are matched by Salesforce id, then by any of
 * their emails, and created when neither matches. Email addresses belong
 * to the canonical store once set; the CRM only fills them in.
 */
export function salesforceVolunteerImport(
  options: VolunteerImportOptions = {}
): ImportDefinition<null> {
  return {
    name: 'salesforce-volunteers',
    entityType: 'volunteer',
    source: 'salesforce',
    columns: VOLUNTEER_COLUMNS,
    dedupe: { key: (row) => row.get('Id') ?? null, keep: 'keep-last' },

    prepare: async () => null,

    async processRow(row, context) {
      const salesforceId = row.require('Id')
      const emails = collectEmails(row, context)
      const volunteers = context.store.volunteers

      const { entity } = await resolveUnique(context.resolver, volunteers, 'volunteer', {
        externalId: { source: 'salesforce', id: salesforceId },
        emails,
      })

      const phones = normalizePhones(PHONE_FIELDS.map((field) => row.get(field)))
      const address = mailingAddress(row)

      const incoming: IncomingFields<Volunteer> = {
        contact: {
          firstName: row.get('FirstName') ?? '',
          lastName: row.require('LastName'),
          middleName: row.get('MiddleName'),
          emails: emails.length > 0 ? emails : undefined,
          phones: phones.length > 0 ? phones : undefined,
          addresses: address ? [address] : undefined,
          gender: row.get('Gender__c')?.toLowerCase().replace(/\s+/g, '_'),
          birthdate: dateOnly(row.get('Birthdate')),
        },
        title: row.get('Title'),
        organizationName: row.get('npsp__Primary_Affiliation__c'),
        skills: row.hasColumn('Volunteer_Skills__c')
          ? splitMultiSelect(row.get('Volunteer_Skills__c'))
          : undefined,
        lastVolunteerDate: dateOnly(row.get('Last_Volunteer_Date__c')),
      }

      const accountId = row.get('AccountId')
      if (accountId) {
        const organization = await context.store.organizations.findByExternalId(
          'salesforce',
          accountId
        )
        if (organization) {
          incoming.organizationIds = [organization.id]
        } else {
          context.warn(
            `Unknown AccountId ${accountId}; organization not linked`,
            context.rowNumber
          )
        }
      }
      if (!entity) {
        incoming.kind = 'volunteer'
        incoming.localStatus = deriveLocalStatus(address ? [address] : [], options.locality)
      }

      const saved = await mergeAndSave(context, volunteers, {
        entityType: 'volunteer',
        source: 'salesforce',
        existing: entity,
        incoming,
        externalId: salesforceId,
        create: newEntity.volunteer,
      })
      if (saved.outcome !== 'unchanged') {
        context.affect(cacheKeys.volunteer(saved.entity.id))
      }
      return { kind: rowKind(saved.outcome), changes: [saved.summary] }
    },
  }
}
