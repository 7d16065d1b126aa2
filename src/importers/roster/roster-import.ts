/**
 * Teacher roster import (Google Sheets export)
 * @module importers/roster/roster-import
 */

import type { RosterRemovalPolicy } from '../../config/config.js'
import { normalizeEmail } from '../../core/normalizers/email.js'
import { displayName, parseFullName } from '../../core/normalizers/name.js'
import type { SourceRowView } from '../../import/columns.js'
import { RowInvalidError } from '../../import/import-error.js'
import type {
  ColumnSpec,
  FinalizeContext,
  ImportDefinition,
  RowContext,
} from '../../import/types.js'
import type { IncomingFields } from '../../merge/types.js'
import { ReviewQueue } from '../../queue/review-queue.js'
import { parseAcademicYear } from '../../status/academic-year.js'
import type { MatchConfidence, Teacher, TeacherProgress } from '../../types/entities.js'
import { requireNonEmptyString } from '../../utils/errors.js'
import {
  cacheKeys,
  mergeAndSave,
  newEntity,
  requireEmail,
  resolveUnique,
  rowKind,
  type SavedMerge,
} from '../shared.js'

export const ROSTER_COLUMNS: readonly ColumnSpec[] = [
  { key: 'building', aliases: ['Building', 'School'], required: true },
  { key: 'name', aliases: ['Name', 'Teacher Name', 'Teacher'], required: true },
  { key: 'email', aliases: ['Email', 'Teacher Email', 'Email Address'], required: true },
  { key: 'grade', aliases: ['Grade', 'Grade Level'] },
  { key: 'targetSessions', aliases: ['Target Sessions', 'Target', 'Goal'] },
]

export interface RosterImportOptions {
  /** `YYYY-YYYY` */
  academicYear: string
  districtName: string
  /** What happens to roster entries missing from this file (default: soft-delete) */
  removalPolicy?: RosterRemovalPolicy
}

interface TeacherLink {
  teacher: SavedMerge<Teacher> | null
  teacherId: string
  confidence: MatchConfidence
}

function targetSessions(row: SourceRowView): number | undefined {
  const target = row.getNumber('targetSessions')
  if (target !== undefined && (!Number.isInteger(target) || target < 1)) {
    throw new RowInvalidError(
      `'targetSessions' must be a whole number of at least 1: ${target}`,
      'targetSessions',
      String(target)
    )
  }
  return target
}

/**
 * Finds or creates the canonical teacher for a roster entry. Email matches
 * are exact and take the roster's name; a fuzzy name match within the same
 * building is linked with low confidence and leaves the teacher untouched.
 */
async function linkTeacher(
  email: string,
  name: string,
  building: string,
  context: RowContext<null>
): Promise<TeacherLink> {
  const teachers = context.store.teachers
  const { entity, confidence } = await resolveUnique(
    context.resolver,
    teachers,
    'teacher',
    { emails: [email], fuzzyName: { name, scope: building } },
    {
      nameOf: (teacher) => displayName(teacher.contact.firstName, teacher.contact.lastName),
      scopeOf: (teacher) => teacher.schoolName ?? null,
    }
  )

  if (entity && confidence === 'low') {
    return { teacher: null, teacherId: entity.id, confidence: 'low' }
  }

  const parsed = parseFullName(name)
  const incoming: IncomingFields<Teacher> = {
    contact: { firstName: parsed.firstName, lastName: parsed.lastName },
    schoolName: building,
  }
  if (!entity) {
    incoming.kind = 'teacher'
    incoming.contact = { ...incoming.contact, emails: [email] }
  }
  const saved = await mergeAndSave(context, teachers, {
    entityType: 'teacher',
    source: 'roster',
    existing: entity,
    incoming,
    create: newEntity.teacher,
  })
  return { teacher: saved, teacherId: saved.entity.id, confidence: 'exact' }
}

/**
 * Applies the removal policy to this roster's entries that the file no
 * longer lists. A batch that stopped early never removes anything.
 */
async function applyRemovals(
  context: FinalizeContext<null>,
  options: Required<RosterImportOptions>
): Promise<void> {
  if (context.terminatedEarly) {
    context.warn('Batch stopped early; roster removals not applied')
    return
  }

  const listed = new Set<string>()
  for (const row of context.rows) {
    const email = normalizeEmail(row.get('email'))
    if (email) listed.add(email)
  }

  const missing = await context.store.teacherProgress.findMany(
    (progress) =>
      progress.academicYear === options.academicYear &&
      progress.districtName === options.districtName &&
      progress.isActive &&
      !listed.has(progress.email)
  )
  if (missing.length === 0) return

  const timestamp = context.now.toISOString()
  const queue = new ReviewQueue(context.store.reviewItems, {
    now: () => context.now,
    logger: context.logger,
  })

  for (const progress of missing) {
    switch (options.removalPolicy) {
      case 'soft-delete':
        await context.store.teacherProgress.update(progress.id, {
          isActive: false,
          removedAt: timestamp,
          updatedAt: timestamp,
        })
        break
      case 'hard-remove':
        await context.store.teacherProgress.delete(progress.id)
        break
      case 'flag-only': {
        const flagged = await context.store.reviewItems.count(
          (item) =>
            item.status === 'pending' &&
            item.reason === 'roster-removal' &&
            item.candidateIds.includes(progress.id)
        )
        if (flagged === 0) {
          await queue.add({
            reason: 'roster-removal',
            entityType: 'teacherProgress',
            source: 'roster',
            batchId: context.batchId,
            row: { email: progress.email, name: progress.name, building: progress.building },
            message: `${progress.email} is no longer on the ${options.districtName} roster for ${options.academicYear}`,
            candidateIds: [progress.id],
          })
        }
        break
      }
    }
    context.affect(cacheKeys.teacherProgress(progress.id))
  }

  context.logger.info('Roster removals applied', {
    policy: options.removalPolicy,
    count: missing.length,
    academicYear: options.academicYear,
    districtName: options.districtName,
  })
}

/**
 * Roster import for one district and academic year.
 *
 * Each row upserts the TeacherProgress entry keyed by (email, academic year,
 * district) and links it to a canonical teacher. A repeated email keeps its
 * first row. Manual links made from the review queue are never replaced.
 *
 * @example
 * ```typescript
 * await processor.run(
 *   store,
 *   rosterImport({ academicYear: '2025-2026', districtName: 'Hickman Mills' }),
 *   csvFileSource('roster.csv')
 * )
 * ```
 */
export function rosterImport(options: RosterImportOptions): ImportDefinition<null> {
  parseAcademicYear(options.academicYear)
  const settings: Required<RosterImportOptions> = {
    academicYear: options.academicYear.trim(),
    districtName: requireNonEmptyString(options.districtName.trim(), 'districtName'),
    removalPolicy: options.removalPolicy ?? 'soft-delete',
  }

  return {
    name: 'roster',
    entityType: 'teacherProgress',
    source: 'roster',
    columns: ROSTER_COLUMNS,
    dedupe: { key: (row) => normalizeEmail(row.get('email')), keep: 'keep-first' },

    prepare: async () => null,

    async processRow(row, context) {
      const building = row.require('building')
      const name = row.require('name')
      const email = requireEmail(row, 'email')
      const target = targetSessions(row)

      const progressRepo = context.store.teacherProgress
      const existing = await progressRepo.findOne({
        email,
        academicYear: settings.academicYear,
        districtName: settings.districtName,
      })

      const link: TeacherLink | null = existing?.teacherId
        ? null
        : await linkTeacher(email, name, building, context)

      const incoming: IncomingFields<TeacherProgress> = {
        academicYear: settings.academicYear,
        districtName: settings.districtName,
        email,
        name,
        building,
        grade: row.get('grade'),
        targetSessions: target,
        isActive: true,
        removedAt: null,
      }
      if (link) {
        incoming.teacherId = link.teacherId
        incoming.teacherMatchConfidence = link.confidence
      }

      const saved = await mergeAndSave(context, progressRepo, {
        entityType: 'teacherProgress',
        source: 'roster',
        existing,
        incoming,
        create: newEntity.teacherProgress,
      })

      context.affect(cacheKeys.teacherProgress(saved.entity.id))
      const teacherId = saved.entity.teacherId
      if (teacherId) context.affect(cacheKeys.teacher(teacherId))

      const secondary = link?.teacher ? [link.teacher] : []
      return {
        kind: rowKind(
          saved.outcome,
          secondary.map((merge) => merge.outcome)
        ),
        changes: [saved.summary, ...secondary.map((merge) => merge.summary)],
      }
    },

    finalize: (context) => applyRemovals(context, settings),
  }
}
