import { describe, it, expect, beforeEach } from 'vitest'
import { newEntity } from '../../../src/importers/shared.js'
import { createMemoryStore } from '../../../src/store/memory-store.js'
import type { CanonicalStore } from '../../../src/store/types.js'
import { archiveSemester } from '../../../src/status/semester-archive.js'
import { StatusDerivationEngine } from '../../../src/status/status-engine.js'
import {
  YEAR,
  seedEvent,
  seedProgress,
  seedTeacher,
  sequentialIds,
  testClock,
} from '../../fixtures/polaris.js'

describe('archiveSemester', () => {
  let store: CanonicalStore
  let engine: StatusDerivationEngine
  const clock = testClock('2026-01-05T09:00:00Z')

  beforeEach(async () => {
    store = createMemoryStore('archive')
    engine = new StatusDerivationEngine({ now: clock.now })

    await seedTeacher(store, 'teacher-1', {
      firstName: 'Ada',
      lastName: 'Lovelace',
      emails: ['ada.lovelace@hmschools.test'],
    })
    await seedEvent(store, 'event-1', { title: 'Robotics', startDate: '2025-10-10T15:00:00.000Z' })
    const stamp = '2025-08-01T00:00:00.000Z'
    await store.eventTeachers.insert({
      ...newEntity.eventTeacher({ id: 'session-1', createdAt: stamp, updatedAt: stamp, externalIds: {} }),
      eventId: 'event-1',
      teacherId: 'teacher-1',
      status: 'Attended',
      attendanceConfirmedAt: '2025-10-10T15:00:00.000Z',
      sessionStart: '2025-10-10T15:00:00.000Z',
      compositeKey: 'event-1|teacher-1',
    })

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
  })

  it('snapshots the status of each active entry', async () => {
    const result = await archiveSemester(
      store,
      engine,
      { academicYear: YEAR, semester: 'Fall' },
      { now: clock.now, generateId: sequentialIds('archive') }
    )

    expect(result).toEqual({ semesterLabel: 'Fall 2025', archived: 3, alreadyArchived: 0 })
    const snapshots = await store.teacherProgressArchives.findMany()
    expect(snapshots.map((s) => [s.teacherProgressId, s.status, s.completed])).toEqual([
      ['progress-1', 'Achieved', 1],
      ['progress-2', 'Not Started', 0],
      ['progress-4', 'Not Started', 0],
    ])
    expect(snapshots[0]).toEqual({
      id: 'archive-1',
      createdAt: '2026-01-05T09:00:00.000Z',
      updatedAt: '2026-01-05T09:00:00.000Z',
      teacherProgressId: 'progress-1',
      academicYear: YEAR,
      semester: 'Fall',
      semesterLabel: 'Fall 2025',
      status: 'Achieved',
      completed: 1,
      planned: 0,
      target: 1,
      archivedAt: '2026-01-05T09:00:00.000Z',
    })
  })

  it('adds nothing when run again', async () => {
    const request = { academicYear: YEAR, semester: 'Fall' as const }
    await archiveSemester(store, engine, request, { now: clock.now })
    const again = await archiveSemester(store, engine, request, { now: clock.now })

    expect(again).toEqual({ semesterLabel: 'Fall 2025', archived: 0, alreadyArchived: 3 })
    expect(await store.teacherProgressArchives.count()).toBe(3)
  })

  it('limits the snapshot to one district', async () => {
    const result = await archiveSemester(
      store,
      engine,
      { academicYear: YEAR, semester: 'Fall', districtName: 'Kansas City Kansas' },
      { now: clock.now }
    )
    expect(result.archived).toBe(1)
  })

  it('leaves the next semester starting from Not Started', async () => {
    await archiveSemester(store, engine, { academicYear: YEAR, semester: 'Fall' }, { now: clock.now })
    const progress = await store.teacherProgress.findById('progress-1')
    expect(progress?.teacherId).toBe('teacher-1')

    const yearly = await engine.rosterReport(store, YEAR, 'Hickman Mills')
    expect(yearly[0].summary.status).toBe('Achieved')

    await archiveSemester(store, engine, { academicYear: YEAR, semester: 'Spring' }, { now: clock.now })
    const springSnapshot = await store.teacherProgressArchives.findMany({
      teacherProgressId: 'progress-1',
      semester: 'Spring',
    })
    expect(springSnapshot).toHaveLength(1)
    expect(springSnapshot[0]).toMatchObject({ semesterLabel: 'Spring 2026', status: 'Not Started' })
  })

  it('rejects a malformed academic year', async () => {
    await expect(
      archiveSemester(store, engine, { academicYear: '2025', semester: 'Fall' })
    ).rejects.toThrow("Invalid parameter 'academicYear'")
  })
})
