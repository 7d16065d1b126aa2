/**
 * Semester archival of derived teacher progress
 * @module status/semester-archive
 */

import { v4 as uuidv4 } from 'uuid'
import type { CanonicalStore } from '../store/types.js'
import type { SemesterName, TeacherProgressArchive } from '../types/entities.js'
import { requireOneOf } from '../utils/errors.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { semesterWindow } from './academic-year.js'
import type { StatusDerivationEngine } from './status-engine.js'

export interface ArchiveSemesterRequest {
  academicYear: string
  semester: SemesterName
  /** Limit to one district's roster */
  districtName?: string
}

export interface ArchiveSemesterOptions {
  now?: () => Date
  generateId?: () => string
  logger?: Logger
}

export interface ArchiveSemesterResult {
  semesterLabel: string
  archived: number
  /** Entries that already had a snapshot for the semester */
  alreadyArchived: number
}

const SEMESTERS: readonly SemesterName[] = ['Fall', 'Spring']

/**
 * Snapshots each active roster entry's status for a finished semester.
 *
 * Run by an administrator; nothing schedules it. Status is always derived
 * per window, so once the snapshot is taken the next semester's reports
 * start from Not Started without touching any stored row. Running it again
 * for the same semester adds nothing.
 */
export async function archiveSemester(
  store: CanonicalStore,
  engine: StatusDerivationEngine,
  request: ArchiveSemesterRequest,
  options: ArchiveSemesterOptions = {}
): Promise<ArchiveSemesterResult> {
  const semester = requireOneOf(request.semester, SEMESTERS, 'semester')
  const window = semesterWindow(request.academicYear, semester)
  const now = options.now ?? (() => new Date())
  const generateId = options.generateId ?? uuidv4
  const logger = options.logger ?? createSilentLogger()

  const entries = await store.teacherProgress.findMany(
    (progress) =>
      progress.isActive &&
      progress.academicYear === request.academicYear &&
      (request.districtName === undefined || progress.districtName === request.districtName)
  )

  return store.transaction(async (tx) => {
    let archived = 0
    let alreadyArchived = 0
    for (const progress of entries) {
      const existing = await tx.teacherProgressArchives.count({
        teacherProgressId: progress.id,
        academicYear: request.academicYear,
        semester,
      })
      if (existing > 0) {
        alreadyArchived++
        continue
      }

      const summary = await engine.teacherProgressStatus(tx, progress, window)
      const timestamp = now().toISOString()
      const snapshot: TeacherProgressArchive = {
        id: generateId(),
        createdAt: timestamp,
        updatedAt: timestamp,
        teacherProgressId: progress.id,
        academicYear: request.academicYear,
        semester,
        semesterLabel: window.label,
        status: summary.status,
        completed: summary.completed,
        planned: summary.planned,
        target: summary.target,
        archivedAt: timestamp,
      }
      await tx.teacherProgressArchives.insert(snapshot)
      archived++
    }

    logger.info('Semester archived', {
      semester: window.label,
      archived,
      alreadyArchived,
    })
    return { semesterLabel: window.label, archived, alreadyArchived }
  })
}
