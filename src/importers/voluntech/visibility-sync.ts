/**
 * VolunTeach publishing sync: visibility toggle and district links
 * @module importers/voluntech/visibility-sync
 */

import { RowInvalidError, RowUnmatchedError } from '../../import/import-error.js'
import type { ColumnSpec, ImportDefinition } from '../../import/types.js'
import type { IncomingFields } from '../../merge/types.js'
import type { CanonicalEvent } from '../../types/entities.js'
import { parseCheckbox, splitMultiSelect } from '../salesforce/value-maps.js'
import { cacheKeys, mergeAndSave, newEntity, resolveUnique, rowKind } from '../shared.js'

const VISIBILITY_COLUMNS: readonly ColumnSpec[] = [
  {
    key: 'salesforceId',
    aliases: ['Salesforce Id', 'Session Id', 'Event Id', 'salesforce_id', 'Id'],
    required: true,
  },
  { key: 'visible', aliases: ['Display on Website', 'Show on Website', 'Public', 'is_visible'] },
  { key: 'districts', aliases: ['District', 'Districts', 'District Names'] },
]

/**
 * Publishing-system sync. Each row names an event by its CRM id and carries
 * the event's public-page toggle and district links. Events are never
 * created here and CRM-owned fields are never part of the incoming row.
 */
export function voluntechVisibilitySync(): ImportDefinition<Map<string, string>> {
  return {
    name: 'voluntech-visibility',
    entityType: 'event',
    source: 'voluntech',
    columns: VISIBILITY_COLUMNS,
    dedupe: { key: (row) => row.get('salesforceId') ?? null, keep: 'keep-last' },

    async prepare(context) {
      const districts = new Map<string, string>()
      for (const district of await context.store.districts.findMany()) {
        const id = district.externalIds.salesforce
        if (id) districts.set(id, district.id)
        districts.set(district.name.toLowerCase(), district.id)
      }
      return districts
    },

    async processRow(row, context) {
      const salesforceId = row.require('salesforceId')
      const { entity, attemptedKeys } = await resolveUnique(
        context.resolver,
        context.store.events,
        'event',
        { externalId: { source: 'salesforce', id: salesforceId } }
      )
      if (!entity) {
        throw new RowUnmatchedError(
          `Event ${salesforceId} has not been imported from the CRM`,
          'event',
          attemptedKeys
        )
      }

      const incoming: IncomingFields<CanonicalEvent> = {}
      const rawVisible = row.get('visible')
      if (rawVisible !== undefined) {
        const visible = parseCheckbox(rawVisible)
        if (visible === undefined) {
          throw new RowInvalidError(`Invalid visibility flag: ${rawVisible}`, 'visible', rawVisible)
        }
        incoming.publicVisibility = visible
      }
      if (row.hasColumn('districts')) {
        const districtIds: string[] = []
        for (const name of splitMultiSelect(row.get('districts'))) {
          const id = context.prepared.get(name) ?? context.prepared.get(name.toLowerCase())
          if (!id) {
            throw new RowInvalidError(`Unknown district: ${name}`, 'districts', name)
          }
          districtIds.push(id)
        }
        incoming.districtIds = districtIds
      }

      const saved = await mergeAndSave(context, context.store.events, {
        entityType: 'event',
        source: 'voluntech',
        existing: entity,
        incoming,
        create: newEntity.event,
      })
      if (saved.outcome !== 'unchanged') {
        context.affect(cacheKeys.event(saved.entity.id))
      }
      return { kind: rowKind(saved.outcome), changes: [saved.summary] }
    },
  }
}
