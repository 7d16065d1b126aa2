import ExcelJS from 'exceljs'
import { describe, it, expect, beforeEach } from 'vitest'
import { toImportReport, type ImportBatchProcessor } from '../../src/import/batch-processor.js'
import { arraySource } from '../../src/import/sources/array-source.js'
import { xlsxBufferSource } from '../../src/import/sources/xlsx-source.js'
import { pathfulSessionImport } from '../../src/importers/pathful/pathful-import.js'
import { rosterImport } from '../../src/importers/roster/roster-import.js'
import { ReviewQueue } from '../../src/queue/review-queue.js'
import { ReportCache } from '../../src/status/cache/report-cache.js'
import { StatusDerivationEngine } from '../../src/status/status-engine.js'
import type { TeacherProgressSummary } from '../../src/status/teacher-progress.js'
import { createMemoryStore } from '../../src/store/memory-store.js'
import type { CanonicalStore } from '../../src/store/types.js'
import {
  DISTRICT,
  ROSTER_TEACHERS,
  YEAR,
  pathfulRow,
  rosterRow,
  seedTeacher,
  testClock,
  testProcessor,
  type TestClock,
} from '../fixtures/polaris.js'

describe('Pathful session import', () => {
  let store: CanonicalStore
  let clock: TestClock
  let status: StatusDerivationEngine
  let processor: ImportBatchProcessor

  async function importRoster(teachers = ROSTER_TEACHERS) {
    return processor.run(
      store,
      rosterImport({ academicYear: YEAR, districtName: DISTRICT }),
      arraySource(teachers.map((teacher) => rosterRow(teacher.name, teacher.email)))
    )
  }

  beforeEach(() => {
    store = createMemoryStore('pathful')
    clock = testClock('2025-10-01T12:00:00Z')
    status = new StatusDerivationEngine({
      cache: new ReportCache<TeacherProgressSummary>({ now: () => clock.now().getTime() }),
      now: clock.now,
    })
    processor = testProcessor(clock, [status.completionHook()])
  })

  describe('idempotent re-import', () => {
    const sessions = ROSTER_TEACHERS.map((teacher, i) =>
      pathfulRow({
        'Session ID': `S-${100 + i}`,
        'Event ID': `E-${200 + i}`,
        'Teacher Email': teacher.email,
        'Teacher Name': teacher.name,
        'Session Start': `2025-10-${String(10 + i).padStart(2, '0')} 15:00`,
        Status: 'Upcoming',
        Title: `Career Connect ${i + 1}`,
        Duration: '45',
      })
    )

    it('creates one session per row on first import', async () => {
      await importRoster()
      const batch = await processor.run(store, pathfulSessionImport(), arraySource(sessions))

      expect(batch.status).toBe('completed')
      expect(toImportReport(batch)).toEqual({
        rows_processed: 10,
        rows_created: 10,
        rows_updated: 0,
        rows_skipped: 0,
        rows_unmatched: 0,
        rows_invalid: 0,
      })
      expect(await store.eventTeachers.count()).toBe(10)
      expect(await store.events.count()).toBe(10)
      expect(await store.teachers.count()).toBe(10)
    })

    it('skips every row when the same file is imported again', async () => {
      await importRoster()
      await processor.run(store, pathfulSessionImport(), arraySource(sessions))
      const second = await processor.run(store, pathfulSessionImport(), arraySource(sessions))

      expect(toImportReport(second)).toEqual({
        rows_processed: 10,
        rows_created: 0,
        rows_updated: 0,
        rows_skipped: 10,
        rows_unmatched: 0,
        rows_invalid: 0,
      })
      expect(second.changeLog).toEqual([])
      expect(await store.eventTeachers.count()).toBe(10)
      expect(await store.events.count()).toBe(10)
    })

    it('records the virtual event from the session row', async () => {
      await importRoster()
      await processor.run(store, pathfulSessionImport(), arraySource(sessions))

      const event = await store.events.findByExternalId('pathful', 'E-200')
      expect(event).toMatchObject({
        title: 'Career Connect 1',
        startDate: '2025-10-10T15:00:00.000Z',
        durationMinutes: 45,
        format: 'virtual',
        status: 'Confirmed',
        registeredCount: 1,
        attendedCount: 0,
      })
    })
  })

  describe('workbook export', () => {
    async function sessionWorkbook(): Promise<Buffer> {
      const workbook = new ExcelJS.Workbook()
      const sheet = workbook.addWorksheet('Sessions')
      sheet.addRow([
        'Session ID',
        'Event ID',
        'Teacher Email',
        'Teacher Name',
        'Session Start',
        'Status',
        'Title',
        'Duration',
      ])
      sheet.addRow([
        'S-100',
        'E-200',
        'ada.lovelace@hmschools.test',
        'Ada Lovelace',
        new Date(Date.UTC(2025, 9, 10, 15, 0, 0)),
        'Upcoming',
        'Career Connect 1',
        45,
      ])
      return Buffer.from(await workbook.xlsx.writeBuffer())
    }

    it('imports sessions from an xlsx export', async () => {
      await importRoster()
      const data = await sessionWorkbook()

      const batch = await processor.run(
        store,
        pathfulSessionImport(),
        xlsxBufferSource(data, 'sessions.xlsx')
      )

      expect(batch).toMatchObject({ status: 'completed', rowsCreated: 1 })
      expect(await store.events.findByExternalId('pathful', 'E-200')).toMatchObject({
        title: 'Career Connect 1',
        startDate: '2025-10-10T15:00:00.000Z',
        durationMinutes: 45,
      })

      const again = await processor.run(
        store,
        pathfulSessionImport(),
        xlsxBufferSource(data, 'sessions.xlsx')
      )
      expect(toImportReport(again)).toMatchObject({ rows_processed: 1, rows_skipped: 1 })
    })

    it('fails the batch when the upload is not a workbook', async () => {
      const batch = await processor.run(
        store,
        pathfulSessionImport(),
        xlsxBufferSource(Buffer.from('not a workbook', 'utf8'), 'sessions.xlsx')
      )

      expect(batch).toMatchObject({ status: 'failed', failureKind: 'unreadable', rowsProcessed: 0 })
      expect(batch.failureMessage).toMatch(/^Unreadable file format: /)
    })
  })

  describe('status flip', () => {
    const upcoming = pathfulRow({
      'Session ID': 'S-1',
      'Event ID': 'E-1',
      'Teacher Email': 'ada.lovelace@hmschools.test',
      'Session Start': '2025-10-15T15:00:00Z',
      Status: 'Upcoming',
      Title: 'Robotics Live',
    })

    it('moves the teacher from In Progress to Achieved when the session completes', async () => {
      await importRoster()
      await processor.run(store, pathfulSessionImport(), arraySource([upcoming]))

      const [progress] = await store.teacherProgress.findMany({
        email: 'ada.lovelace@hmschools.test',
      })
      const before = await status.teacherProgressStatus(store, progress)
      expect(before.status).toBe('In Progress')
      expect(before.planned).toBe(1)

      clock.set('2025-10-20T12:00:00Z')
      const completed = { ...upcoming, Status: 'Completed' }
      const batch = await processor.run(store, pathfulSessionImport(), arraySource([completed]))

      expect(toImportReport(batch)).toMatchObject({ rows_updated: 1, rows_created: 0 })
      const session = await store.eventTeachers.findByExternalId('pathful', 'S-1')
      expect(session).toMatchObject({
        status: 'Attended',
        attendanceConfirmedAt: '2025-10-15T15:00:00.000Z',
      })
      expect(await store.eventTeachers.count()).toBe(1)

      const after = await status.teacherProgressStatus(store, progress)
      expect(after).toMatchObject({ status: 'Achieved', completed: 1, planned: 0 })
    })

    it('completes the event once a teacher attended', async () => {
      await importRoster()
      await processor.run(store, pathfulSessionImport(), arraySource([upcoming]))
      await processor.run(
        store,
        pathfulSessionImport(),
        arraySource([{ ...upcoming, Status: 'Completed' }])
      )

      const event = await store.events.findByExternalId('pathful', 'E-1')
      expect(event).toMatchObject({ status: 'Completed', registeredCount: 1, attendedCount: 1 })
    })
  })

  describe('teachers outside the roster', () => {
    it('reports an unknown teacher as unmatched and queues the row', async () => {
      await importRoster()
      const row = pathfulRow({
        'Session ID': 'S-9',
        'Event ID': 'E-9',
        'Teacher Email': 'Stranger@Elsewhere.test',
        'Session Start': '2025-10-15 15:00',
        Status: 'Upcoming',
      })
      const batch = await processor.run(store, pathfulSessionImport(), arraySource([row]))

      expect(toImportReport(batch)).toEqual({
        rows_processed: 1,
        rows_created: 0,
        rows_updated: 0,
        rows_skipped: 0,
        rows_unmatched: 1,
        rows_invalid: 0,
      })
      expect(batch.errors).toEqual([
        {
          row: 1,
          code: 'ROW_UNMATCHED',
          message: 'Teacher stranger@elsewhere.test is not on an imported roster',
        },
      ])
      expect(await store.teachers.count()).toBe(ROSTER_TEACHERS.length)
      expect(await store.events.count()).toBe(0)

      const items = await new ReviewQueue(store.reviewItems).list({ status: 'pending' })
      expect(items).toHaveLength(1)
      expect(items[0]).toMatchObject({
        reason: 'unmatched',
        entityType: 'teacher',
        source: 'pathful',
        batchId: batch.id,
        rowNumber: 1,
        attemptedKeys: ['email:stranger@elsewhere.test'],
        candidateIds: [],
      })
      expect(items[0].row['Teacher Email']).toBe('Stranger@Elsewhere.test')
    })

    it('creates a rostered teacher that has no canonical record yet', async () => {
      await importRoster([{ name: 'Ada Lovelace', email: 'ada.lovelace@hmschools.test' }])
      const [progress] = await store.teacherProgress.findMany()
      const teacher = await store.teachers.findById(progress.teacherId ?? '')
      expect(teacher).not.toBeNull()

      // A roster entry added by an administrator without a teacher link
      await store.teacherProgress.insert({
        ...progress,
        id: 'progress-manual',
        email: 'new.hire@hmschools.test',
        name: 'New Hire',
        teacherId: null,
        teacherMatchConfidence: null,
      })

      const row = pathfulRow({
        'Session ID': 'S-2',
        'Event ID': 'E-2',
        'Teacher Email': 'new.hire@hmschools.test',
        'Session Start': '2025-10-15 15:00',
        Status: 'Upcoming',
      })
      const batch = await processor.run(store, pathfulSessionImport(), arraySource([row]))
      expect(batch.rowsCreated).toBe(1)

      const created = await store.teachers.findByEmail('new.hire@hmschools.test')
      expect(created).toHaveLength(1)
      expect(created[0].contact).toMatchObject({ firstName: 'New', lastName: 'Hire' })
      expect(created[0].schoolName).toBe('Banneker Elementary')

      const linked = await store.teacherProgress.findById('progress-manual')
      expect(linked).toMatchObject({ teacherId: created[0].id, teacherMatchConfidence: 'exact' })
    })
  })

  describe('row failures', () => {
    it('routes an email shared by two teachers to review as ambiguous', async () => {
      await seedTeacher(store, 'teacher-a', {
        firstName: 'Pat',
        lastName: 'Lee',
        emails: ['shared@hmschools.test'],
      })
      await seedTeacher(store, 'teacher-b', {
        firstName: 'Pat',
        lastName: 'Leigh',
        emails: ['shared@hmschools.test'],
      })
      const row = pathfulRow({
        'Session ID': 'S-3',
        'Event ID': 'E-3',
        'Teacher Email': 'shared@hmschools.test',
        'Session Start': '2025-10-15 15:00',
        Status: 'Upcoming',
      })
      const batch = await processor.run(store, pathfulSessionImport(), arraySource([row]))

      expect(batch.rowsUnmatched).toBe(1)
      expect(batch.rowsAmbiguous).toBe(1)
      expect(batch.errors[0].code).toBe('AMBIGUOUS_MATCH')
      expect(await store.eventTeachers.count()).toBe(0)

      const [item] = await store.reviewItems.findMany()
      expect(item).toMatchObject({
        reason: 'ambiguous',
        entityType: 'teacher',
        candidateIds: ['teacher-a', 'teacher-b'],
      })
    })

    it('keeps the good rows of a file with bad ones', async () => {
      await importRoster()
      const rows = [
        pathfulRow({
          'Session ID': 'S-1',
          'Event ID': 'E-1',
          'Teacher Email': 'ada.lovelace@hmschools.test',
          'Session Start': '2025-10-15 15:00',
          Status: 'Upcoming',
        }),
        pathfulRow({
          'Session ID': 'S-2',
          'Event ID': 'E-2',
          'Teacher Email': 'grace.hopper@hmschools.test',
          'Session Start': '2025-10-16 15:00',
          Status: 'pending',
        }),
        pathfulRow({
          'Session ID': 'S-3',
          'Event ID': 'E-3',
          'Teacher Email': 'alan.turing@hmschools.test',
          'Session Start': '02/30/2025',
          Status: 'Upcoming',
        }),
        pathfulRow({
          'Session ID': 'S-4',
          'Event ID': 'E-4',
          'Teacher Email': 'nobody@hmschools.test',
          'Session Start': '2025-10-17 15:00',
          Status: 'Upcoming',
        }),
        pathfulRow({
          'Session ID': 'S-5',
          'Event ID': 'E-5',
          'Teacher Email': 'mae.jemison@hmschools.test',
          'Session Start': '10/18/2025 3:00 PM',
          Status: 'Registered',
        }),
      ]
      const batch = await processor.run(store, pathfulSessionImport(), arraySource(rows))

      expect(batch.status).toBe('completed')
      expect(toImportReport(batch)).toEqual({
        rows_processed: 5,
        rows_created: 2,
        rows_updated: 0,
        rows_skipped: 0,
        rows_unmatched: 1,
        rows_invalid: 2,
      })
      expect(batch.errors.map((error) => [error.row, error.code, error.message])).toEqual([
        [2, 'ROW_INVALID', 'Unknown attendance status: pending'],
        [3, 'ROW_INVALID', "Malformed date in 'sessionStart': 02/30/2025"],
        [4, 'ROW_UNMATCHED', 'Teacher nobody@hmschools.test is not on an imported roster'],
      ])

      const session = await store.eventTeachers.findByExternalId('pathful', 'S-5')
      expect(session?.sessionStart).toBe('2025-10-18T15:00:00.000Z')
    })
  })

  describe('duplicates within one file', () => {
    it('keeps the last row for a repeated session id', async () => {
      await importRoster()
      const first = pathfulRow({
        'Session ID': 'S-7',
        'Event ID': 'E-7',
        'Teacher Email': 'ada.lovelace@hmschools.test',
        'Session Start': '2025-09-15 15:00',
        Status: 'Upcoming',
      })
      const batch = await processor.run(
        store,
        pathfulSessionImport(),
        arraySource([first, { ...first, Status: 'Completed' }])
      )

      expect(toImportReport(batch)).toMatchObject({
        rows_processed: 2,
        rows_created: 1,
        rows_skipped: 1,
      })
      expect(batch.warnings).toEqual([
        { row: 1, message: 'Duplicate of row 2 in this file; skipped' },
      ])
      const sessions = await store.eventTeachers.findMany()
      expect(sessions).toHaveLength(1)
      expect(sessions[0].status).toBe('Attended')
    })

    it('matches rows without a session id by their composite key', async () => {
      await importRoster()
      const row = pathfulRow({
        'Event ID': 'E-8',
        'Teacher Email': 'ada.lovelace@hmschools.test',
        'Session Start': '2025-10-15 15:00',
        Status: 'Upcoming',
      })
      await processor.run(store, pathfulSessionImport(), arraySource([row]))
      const second = await processor.run(store, pathfulSessionImport(), arraySource([row]))

      expect(second.rowsSkipped).toBe(1)
      const [session] = await store.eventTeachers.findMany()
      expect(session.compositeKey).toBe(
        'E-8|ada.lovelace@hmschools.test|2025-10-15T15:00:00.000Z'
      )
      expect(session.externalIds).toEqual({})
    })
  })

  it('skips rows for other partners when a partner filter is set', async () => {
    await importRoster()
    const rows = [
      {
        ...pathfulRow({
          'Session ID': 'S-1',
          'Event ID': 'E-1',
          'Teacher Email': 'ada.lovelace@hmschools.test',
          'Session Start': '2025-10-15 15:00',
          Status: 'Upcoming',
        }),
        Partner: 'PREP-KC',
      },
      {
        ...pathfulRow({
          'Session ID': 'S-2',
          'Event ID': 'E-2',
          'Teacher Email': 'grace.hopper@hmschools.test',
          'Session Start': '2025-10-15 15:00',
          Status: 'Upcoming',
        }),
        Partner: 'Another Partner',
      },
    ]
    const batch = await processor.run(
      store,
      pathfulSessionImport({ partnerFilter: 'prep-kc' }),
      arraySource(rows)
    )

    expect(toImportReport(batch)).toMatchObject({ rows_created: 1, rows_skipped: 1 })
    expect(await store.eventTeachers.count()).toBe(1)
  })
})
