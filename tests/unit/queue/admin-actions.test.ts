import { describe, it, expect, beforeEach, vi } from 'vitest'
import { arraySource } from '../../../src/import/sources/array-source.js'
import type { EntityChangeHook } from '../../../src/import/types.js'
import { rosterImport } from '../../../src/importers/roster/roster-import.js'
import { linkTeacherProgress, relinkExternalId } from '../../../src/queue/admin-actions.js'
import { ReviewQueue } from '../../../src/queue/review-queue.js'
import { ReportCache } from '../../../src/status/cache/report-cache.js'
import { StatusDerivationEngine } from '../../../src/status/status-engine.js'
import type { TeacherProgressSummary } from '../../../src/status/teacher-progress.js'
import { createMemoryStore } from '../../../src/store/memory-store.js'
import { NotFoundError } from '../../../src/store/store-error.js'
import type { CanonicalStore } from '../../../src/store/types.js'
import {
  DISTRICT,
  YEAR,
  rosterRow,
  seedEvent,
  seedProgress,
  seedSession,
  seedTeacher,
  seedVolunteer,
  testClock,
  testProcessor,
} from '../../fixtures/polaris.js'

const NOW = '2025-09-01T12:00:00.000Z'

describe('admin actions', () => {
  let store: CanonicalStore
  const now = () => new Date(NOW)

  beforeEach(() => {
    store = createMemoryStore('admin')
  })

  describe('relinkExternalId', () => {
    beforeEach(async () => {
      await seedVolunteer(store, 'volunteer-1', {
        firstName: 'Mae',
        lastName: 'Jemison',
        emails: ['mae@example.test'],
        salesforceId: '003A',
      })
      await seedVolunteer(store, 'volunteer-2', {
        firstName: 'Mae',
        lastName: 'Jemison',
        emails: ['mae.jemison@example.test'],
      })
    })

    it('moves the id and resolves the review item', async () => {
      const queue = new ReviewQueue(store.reviewItems, { generateId: () => 'review-1' })
      await queue.add({
        reason: 'ambiguous',
        entityType: 'volunteer',
        source: 'salesforce',
        row: { Id: '003A' },
        message: 'Entity volunteer-1 is linked to salesforce id 003A',
      })

      const result = await relinkExternalId(
        store,
        {
          collection: 'volunteers',
          entityId: 'volunteer-2',
          source: 'salesforce',
          externalId: '003A',
          actor: 'admin',
          reviewItemId: 'review-1',
        },
        { now }
      )

      expect(result).toEqual({ previousEntityId: 'volunteer-1' })
      expect((await store.volunteers.findById('volunteer-1'))?.externalIds).toEqual({})
      expect(await store.volunteers.findById('volunteer-2')).toMatchObject({
        externalIds: { salesforce: '003A' },
        updatedAt: NOW,
      })
      expect(await queue.get('review-1')).toMatchObject({
        status: 'resolved',
        resolvedEntityId: 'volunteer-2',
        decidedBy: 'admin',
        notes: 'Relinked salesforce id 003A',
      })
    })

    it('reports no previous holder when the id was free', async () => {
      const result = await relinkExternalId(store, {
        collection: 'volunteers',
        entityId: 'volunteer-2',
        source: 'salesforce',
        externalId: '003B',
        actor: 'admin',
      })

      expect(result).toEqual({ previousEntityId: null })
    })

    it('changes nothing when the target does not exist', async () => {
      await expect(
        relinkExternalId(store, {
          collection: 'volunteers',
          entityId: 'volunteer-9',
          source: 'salesforce',
          externalId: '003A',
          actor: 'admin',
        })
      ).rejects.toBeInstanceOf(NotFoundError)

      expect((await store.volunteers.findById('volunteer-1'))?.externalIds).toEqual({
        salesforce: '003A',
      })
    })
  })

  describe('linkTeacherProgress', () => {
    beforeEach(async () => {
      await seedTeacher(store, 'teacher-ada', {
        firstName: 'Ada',
        lastName: 'Lovelace',
        emails: ['ada.king@hmschools.test'],
      })
      await seedProgress(store, 'progress-ada', {
        email: 'ada.lovelace@hmschools.test',
        name: 'Ada Lovelace',
      })
    })

    it('records the link as exact', async () => {
      const progress = await linkTeacherProgress(
        store,
        { progressId: 'progress-ada', teacherId: 'teacher-ada', actor: 'admin' },
        { now }
      )

      expect(progress).toMatchObject({
        teacherId: 'teacher-ada',
        teacherMatchConfidence: 'exact',
        updatedAt: NOW,
      })
    })

    it('keeps the link through a later roster import', async () => {
      await linkTeacherProgress(store, {
        progressId: 'progress-ada',
        teacherId: 'teacher-ada',
        actor: 'admin',
      })

      const batch = await testProcessor(testClock('2025-09-02T12:00:00Z')).run(
        store,
        rosterImport({ academicYear: YEAR, districtName: DISTRICT }),
        arraySource([rosterRow('Ada Lovelace', 'ada.lovelace@hmschools.test')])
      )

      expect(batch.rowsSkipped).toBe(1)
      expect(await store.teacherProgress.findById('progress-ada')).toMatchObject({
        teacherId: 'teacher-ada',
        teacherMatchConfidence: 'exact',
      })
      expect(await store.teachers.count()).toBe(1)
    })

    it('rejects an unknown teacher', async () => {
      await expect(
        linkTeacherProgress(store, { progressId: 'progress-ada', teacherId: 'nope', actor: 'admin' })
      ).rejects.toThrow("Record 'nope' not found in teachers")
    })
  })

  describe('derived status', () => {
    let status: StatusDerivationEngine

    beforeEach(async () => {
      status = new StatusDerivationEngine({
        cache: new ReportCache<TeacherProgressSummary>({ now: () => 0 }),
        now: () => new Date('2025-11-01T00:00:00Z'),
      })
      await seedTeacher(store, 'teacher-a', {
        firstName: 'Grace',
        lastName: 'Hopper',
        emails: ['g.hopper@hmschools.test'],
      })
      await seedTeacher(store, 'teacher-b', {
        firstName: 'Grace',
        lastName: 'Hopper',
        emails: ['grace.hopper@hmschools.test'],
      })
      await seedEvent(store, 'event-1', { title: 'Robotics', startDate: '2025-10-10T15:00:00.000Z' })
      await seedSession(store, 'session-b', {
        eventId: 'event-1',
        teacherId: 'teacher-b',
        status: 'Attended',
        start: '2025-10-10T15:00:00.000Z',
      })
      await seedProgress(store, 'progress-grace', {
        email: 'grace.hopper@hmschools.test',
        name: 'Grace Hopper',
        teacherId: 'teacher-a',
        teacherMatchConfidence: 'low',
      })
    })

    async function rosterStatus(): Promise<string> {
      const progress = await store.teacherProgress.findById('progress-grace')
      if (!progress) throw new Error('progress-grace missing')
      return (await status.teacherProgressStatus(store, progress)).status
    }

    it('recomputes roster progress once the entry is linked to another teacher', async () => {
      expect(await rosterStatus()).toBe('Not Started')

      await linkTeacherProgress(
        store,
        { progressId: 'progress-grace', teacherId: 'teacher-b', actor: 'admin' },
        { now, onChange: status.changeHook() }
      )

      expect(await rosterStatus()).toBe('Achieved')
    })

    it('reports the entry and both teachers as changed', async () => {
      const onChange = vi.fn<EntityChangeHook>(async () => undefined)

      await linkTeacherProgress(
        store,
        { progressId: 'progress-grace', teacherId: 'teacher-b', actor: 'admin' },
        { onChange }
      )

      expect(onChange).toHaveBeenCalledWith(store, [
        'teacher-progress:progress-grace',
        'teacher:teacher-b',
        'teacher:teacher-a',
      ])
    })

    it('reports both holders when an external id moves', async () => {
      await store.teachers.update('teacher-a', { externalIds: { pathful: 'PF-77' } })
      const onChange = vi.fn<EntityChangeHook>(async () => undefined)

      await relinkExternalId(
        store,
        {
          collection: 'teachers',
          entityId: 'teacher-b',
          source: 'pathful',
          externalId: 'PF-77',
          actor: 'admin',
        },
        { onChange }
      )

      expect(onChange).toHaveBeenCalledWith(store, ['teacher:teacher-b', 'teacher:teacher-a'])
    })

    it('leaves the cache alone when the link fails', async () => {
      const onChange = vi.fn<EntityChangeHook>(async () => undefined)

      await expect(
        linkTeacherProgress(
          store,
          { progressId: 'progress-none', teacherId: 'teacher-b', actor: 'admin' },
          { onChange }
        )
      ).rejects.toThrow("Record 'progress-none' not found in teacherProgress")

      expect(onChange).not.toHaveBeenCalled()
    })
  })
})
