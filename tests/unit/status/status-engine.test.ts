import { describe, it, expect, beforeEach } from 'vitest'
import { arraySource } from '../../../src/import/sources/array-source.js'
import type { ImportDefinition } from '../../../src/import/types.js'
import { createMemoryStore } from '../../../src/store/memory-store.js'
import type { CanonicalStore } from '../../../src/store/types.js'
import { academicYearWindow, semesterWindow } from '../../../src/status/academic-year.js'
import { ReportCache } from '../../../src/status/cache/report-cache.js'
import { StatusDerivationEngine, scopedKey } from '../../../src/status/status-engine.js'
import type { TeacherProgressSummary } from '../../../src/status/teacher-progress.js'
import {
  YEAR,
  seedEvent,
  seedProgress,
  seedSession,
  seedTeacher,
  seedVolunteer,
  testClock,
  testProcessor,
} from '../../fixtures/polaris.js'

const window = academicYearWindow(YEAR)

/**
 * Import that only reports the given keys as affected
 */
function touching(keys: string[]): ImportDefinition<null> {
  return {
    name: 'touch',
    entityType: 'eventTeacher',
    source: 'pathful',
    columns: [{ key: 'note', aliases: ['Note'], required: true }],
    prepare: async () => null,
    async processRow(_row, context) {
      for (const key of keys) context.affect(key)
      return { kind: 'skipped' }
    },
  }
}

describe('StatusDerivationEngine', () => {
  let store: CanonicalStore
  let cache: ReportCache<TeacherProgressSummary>
  let engine: StatusDerivationEngine

  beforeEach(async () => {
    store = createMemoryStore('status')
    cache = new ReportCache<TeacherProgressSummary>({ now: () => 0 })
    engine = new StatusDerivationEngine({
      cache,
      now: () => new Date('2025-11-01T00:00:00Z'),
    })
    await seedTeacher(store, 'teacher-1', {
      firstName: 'Ada',
      lastName: 'Lovelace',
      emails: ['ada.lovelace@hmschools.test'],
    })
    await seedEvent(store, 'event-1', { title: 'Robotics', startDate: '2025-10-10T15:00:00.000Z' })
    await seedSession(store, 'session-1', {
      eventId: 'event-1',
      teacherId: 'teacher-1',
      status: 'Attended',
      start: '2025-10-10T15:00:00.000Z',
    })
  })

  it('scopes cache keys by store location', () => {
    expect(scopedKey(store, 'teacher:teacher-1')).toBe('memory:status|teacher:teacher-1')
  })

  describe('teacherStatus', () => {
    it('derives progress from the teacher sessions', async () => {
      const summary = await engine.teacherStatus(store, 'teacher-1', window)
      expect(summary).toMatchObject({ status: 'Achieved', completed: 1, planned: 0 })
    })

    it('is Not Started for a teacher without sessions', async () => {
      const summary = await engine.teacherStatus(store, 'teacher-unknown', window, 2)
      expect(summary).toMatchObject({ status: 'Not Started', needed: 2 })
    })

    it('falls back to the session start when the event is missing', async () => {
      await seedSession(store, 'session-2', {
        eventId: 'event-gone',
        teacherId: 'teacher-2',
        status: 'SignedUp',
        start: '2026-02-01T15:00:00.000Z',
      })
      const summary = await engine.teacherStatus(store, 'teacher-2', window)
      expect(summary).toMatchObject({ status: 'In Progress', planned: 1 })
    })

    it('serves cached values until a batch touches the teacher', async () => {
      expect((await engine.teacherStatus(store, 'teacher-1', window)).status).toBe('Achieved')

      await store.eventTeachers.update('session-1', {
        status: 'NoShow',
        attendanceConfirmedAt: null,
      })
      expect((await engine.teacherStatus(store, 'teacher-1', window)).status).toBe('Achieved')

      const processor = testProcessor(testClock('2025-11-01T00:00:00Z'), [
        engine.completionHook(),
      ])
      await processor.run(store, touching(['teacher:teacher-1']), arraySource([{ Note: 'x' }]))

      expect((await engine.teacherStatus(store, 'teacher-1', window)).status).toBe('Not Started')
    })

    it('keeps other stores cached when one store changes', async () => {
      const other = createMemoryStore('other')
      await engine.teacherStatus(store, 'teacher-1', window)
      await engine.teacherStatus(other, 'teacher-1', window)
      expect(cache.size).toBe(2)

      const processor = testProcessor(testClock('2025-11-01T00:00:00Z'), [
        engine.completionHook(),
      ])
      await processor.run(other, touching(['teacher:teacher-1']), arraySource([{ Note: 'x' }]))

      expect(cache.size).toBe(1)
      expect(cache.get(scopedKey(store, `teacher:teacher-1|${YEAR}|1`))).toMatchObject({
        status: 'Achieved',
      })
    })
  })

  describe('teacherProgressStatus', () => {
    it('uses the entry target over its academic year', async () => {
      const progress = await seedProgress(store, 'progress-1', {
        email: 'ada.lovelace@hmschools.test',
        teacherId: 'teacher-1',
        targetSessions: 2,
      })
      const summary = await engine.teacherProgressStatus(store, progress)
      expect(summary).toMatchObject({
        status: 'Not Started',
        completed: 1,
        target: 2,
        needed: 1,
        progressPercent: 50,
        window: YEAR,
      })
    })

    it('is Not Started for an unlinked entry without caching it', async () => {
      const progress = await seedProgress(store, 'progress-2', {
        email: 'grace.hopper@hmschools.test',
      })
      const summary = await engine.teacherProgressStatus(store, progress)
      expect(summary).toMatchObject({ status: 'Not Started', completed: 0, target: 1 })
      expect(cache.size).toBe(0)
    })

    it('starts each semester from its own sessions', async () => {
      const progress = await seedProgress(store, 'progress-1', {
        email: 'ada.lovelace@hmschools.test',
        teacherId: 'teacher-1',
      })
      const fall = await engine.teacherProgressStatus(
        store,
        progress,
        semesterWindow(YEAR, 'Fall')
      )
      const spring = await engine.teacherProgressStatus(
        store,
        progress,
        semesterWindow(YEAR, 'Spring')
      )
      expect(fall.status).toBe('Achieved')
      expect(spring).toMatchObject({ status: 'Not Started', window: 'Spring 2026' })
    })
  })

  describe('rosterReport', () => {
    it('lists active entries of the district and year', async () => {
      await seedProgress(store, 'progress-1', {
        email: 'ada.lovelace@hmschools.test',
        teacherId: 'teacher-1',
      })
      await seedProgress(store, 'progress-2', { email: 'grace.hopper@hmschools.test' })
      await seedProgress(store, 'progress-3', {
        email: 'alan.turing@hmschools.test',
        isActive: false,
      })
      await seedProgress(store, 'progress-4', {
        email: 'mae.jemison@kck.test',
        districtName: 'Kansas City Kansas',
      })

      const rows = await engine.rosterReport(store, YEAR, 'Hickman Mills')
      expect(rows.map((row) => [row.progress.id, row.summary.status])).toEqual([
        ['progress-1', 'Achieved'],
        ['progress-2', 'Not Started'],
      ])
    })
  })

  describe('local status', () => {
    beforeEach(async () => {
      const volunteer = await seedVolunteer(store, 'volunteer-1', {
        firstName: 'Carl',
        lastName: 'Sagan',
        emails: ['carl@example.test'],
      })
      await store.volunteers.update('volunteer-1', {
        contact: {
          ...volunteer.contact,
          addresses: [{ zipCode: '64111', type: 'home', primary: true }],
        },
      })
    })

    it('stores a changed status and reports whether it changed', async () => {
      expect(await engine.refreshLocalStatus(store, 'volunteer-1')).toBe(true)
      expect((await store.volunteers.findById('volunteer-1'))?.localStatus).toBe('local')
      expect(await engine.refreshLocalStatus(store, 'volunteer-1')).toBe(false)
      expect(await engine.refreshLocalStatus(store, 'volunteer-missing')).toBe(false)
    })

    it('refreshes volunteers a batch touched', async () => {
      const processor = testProcessor(testClock('2025-11-01T00:00:00Z'), [
        engine.completionHook(),
      ])
      await processor.run(store, touching(['volunteer:volunteer-1']), arraySource([{ Note: 'x' }]))

      expect((await store.volunteers.findById('volunteer-1'))?.localStatus).toBe('local')
    })
  })
})
