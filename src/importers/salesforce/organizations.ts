/**
 * Salesforce Account → Organization import
 * @module importers/salesforce/organizations
 */

import type { ColumnSpec, ImportDefinition } from '../../import/types.js'
import type { IncomingFields } from '../../merge/types.js'
import type { Organization } from '../../types/entities.js'
import { buildAddress, mergeAndSave, newEntity, resolveUnique, rowKind } from '../shared.js'

const ORGANIZATION_COLUMNS: readonly ColumnSpec[] = [
  { key: 'Id', aliases: [], required: true },
  { key: 'Name', aliases: [], required: true },
  { key: 'Type', aliases: [] },
  { key: 'Description', aliases: [] },
  { key: 'BillingStreet', aliases: [] },
  { key: 'BillingCity', aliases: [] },
  { key: 'BillingState', aliases: [] },
  { key: 'BillingPostalCode', aliases: [] },
]

export function salesforceOrganizationImport(): ImportDefinition<null> {
  return {
    name: 'salesforce-organizations',
    entityType: 'organization',
    source: 'salesforce',
    columns: ORGANIZATION_COLUMNS,
    dedupe: { key: (row) => row.get('Id') ?? null, keep: 'keep-last' },

    prepare: async () => null,

    async processRow(row, context) {
      const salesforceId = row.require('Id')
      const { entity } = await resolveUnique(
        context.resolver,
        context.store.organizations,
        'organization',
        { externalId: { source: 'salesforce', id: salesforceId } }
      )

      const incoming: IncomingFields<Organization> = {
        name: row.require('Name'),
        type: row.get('Type'),
        description: row.get('Description'),
      }
      const address = buildAddress(
        {
          street: row.get('BillingStreet'),
          city: row.get('BillingCity'),
          state: row.get('BillingState'),
          zipCode: row.get('BillingPostalCode'),
        },
        'work',
        true
      )
      if (address) incoming.address = address

      const saved = await mergeAndSave(context, context.store.organizations, {
        entityType: 'organization',
        source: 'salesforce',
        existing: entity,
        incoming,
        externalId: salesforceId,
        create: newEntity.organization,
      })
      return { kind: rowKind(saved.outcome), changes: [saved.summary] }
    },
  }
}
