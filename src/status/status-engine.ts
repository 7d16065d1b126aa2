/**
 * Status derivation over committed data, with explicit cache invalidation
 * @module status/status-engine
 */

import { DEFAULT_LOCALITY, type LocalityConfig } from '../config/config.js'
import type { BatchCompletionHook, EntityChangeHook } from '../import/types.js'
import type { CanonicalStore } from '../store/types.js'
import type { CanonicalEvent, TeacherProgress } from '../types/entities.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { academicYearWindow, type ReportingWindow } from './academic-year.js'
import { ReportCache } from './cache/report-cache.js'
import { deriveLocalStatus } from './local-status.js'
import {
  deriveTeacherProgress,
  type SessionOccurrence,
  type TeacherProgressSummary,
} from './teacher-progress.js'

export interface StatusEngineOptions {
  cache?: ReportCache<TeacherProgressSummary>
  now?: () => Date
  locality?: LocalityConfig
  logger?: Logger
}

/**
 * A roster entry with its derived status
 */
export interface TeacherProgressReportRow {
  progress: TeacherProgress
  summary: TeacherProgressSummary
}

const VOLUNTEER_KEY = /^volunteer:(.+)$/

/**
 * Cache tag for an entity key within one store. Tenant stores have their own
 * location, so one tenant's import never invalidates another's reports.
 */
export function scopedKey(store: CanonicalStore, key: string): string {
  return `${store.location}|${key}`
}

/**
 * Derives teacher progress and local-volunteer status from what the store
 * holds. Derivation never fails for missing data: a teacher without sessions
 * is Not Started and a roster entry without a linked teacher likewise.
 *
 * @example
 * ```typescript
 * const engine = new StatusDerivationEngine({ cache: new ReportCache() })
 * processor.onComplete(engine.completionHook())
 * const summary = await engine.teacherStatus(store, teacherId, academicYearWindow('2025-2026'))
 * ```
 */
export class StatusDerivationEngine {
  private readonly cache: ReportCache<TeacherProgressSummary>
  private readonly now: () => Date
  private readonly locality: LocalityConfig
  private readonly logger: Logger

  constructor(options: StatusEngineOptions = {}) {
    this.cache = options.cache ?? new ReportCache()
    this.now = options.now ?? (() => new Date())
    this.locality = options.locality ?? DEFAULT_LOCALITY
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Progress of one teacher within a window against a session target
   */
  async teacherStatus(
    store: CanonicalStore,
    teacherId: string,
    window: ReportingWindow,
    target = 1
  ): Promise<TeacherProgressSummary> {
    const key = scopedKey(store, `teacher:${teacherId}|${window.label}|${target}`)
    return this.cache.getOrCompute(key, [scopedKey(store, `teacher:${teacherId}`)], async () =>
      deriveTeacherProgress(
        await this.occurrences(store, teacherId),
        target,
        window,
        this.now()
      )
    )
  }

  /**
   * Progress of a roster entry against its own target, by default over its
   * academic year
   */
  async teacherProgressStatus(
    store: CanonicalStore,
    progress: TeacherProgress,
    window: ReportingWindow = academicYearWindow(progress.academicYear)
  ): Promise<TeacherProgressSummary> {
    if (!progress.teacherId) {
      return deriveTeacherProgress([], progress.targetSessions, window, this.now())
    }
    const teacherId = progress.teacherId
    const key = scopedKey(
      store,
      `teacher-progress:${progress.id}|${window.label}|${progress.targetSessions}`
    )
    const tags = [
      scopedKey(store, `teacher-progress:${progress.id}`),
      scopedKey(store, `teacher:${teacherId}`),
    ]
    return this.cache.getOrCompute(key, tags, async () =>
      deriveTeacherProgress(
        await this.occurrences(store, teacherId),
        progress.targetSessions,
        window,
        this.now()
      )
    )
  }

  /**
   * Active roster entries of a district and year with their status
   */
  async rosterReport(
    store: CanonicalStore,
    academicYear: string,
    districtName: string,
    window: ReportingWindow = academicYearWindow(academicYear)
  ): Promise<TeacherProgressReportRow[]> {
    const entries = await store.teacherProgress.findMany(
      (progress) =>
        progress.academicYear === academicYear &&
        progress.districtName === districtName &&
        progress.isActive
    )
    const rows: TeacherProgressReportRow[] = []
    for (const progress of entries) {
      rows.push({ progress, summary: await this.teacherProgressStatus(store, progress, window) })
    }
    return rows
  }

  /**
   * Recomputes a volunteer's local status from their addresses
   *
   * @returns whether the stored status changed
   */
  async refreshLocalStatus(store: CanonicalStore, volunteerId: string): Promise<boolean> {
    const volunteer = await store.volunteers.findById(volunteerId)
    if (!volunteer) return false
    const localStatus = deriveLocalStatus(volunteer.contact.addresses, this.locality)
    if (localStatus === volunteer.localStatus) return false
    await store.volunteers.update(volunteerId, {
      localStatus,
      updatedAt: this.now().toISOString(),
    })
    return true
  }

  /**
   * Drops cached reports tagged with any of the keys and refreshes the local
   * status of the volunteers among them
   */
  async invalidate(
    store: CanonicalStore,
    affectedKeys: readonly string[]
  ): Promise<{ cacheEntriesRemoved: number; localStatusRefreshed: number }> {
    const cacheEntriesRemoved = this.cache.invalidate(
      affectedKeys.map((key) => scopedKey(store, key))
    )

    let localStatusRefreshed = 0
    for (const key of affectedKeys) {
      const match = VOLUNTEER_KEY.exec(key)
      if (match && (await this.refreshLocalStatus(store, match[1]))) localStatusRefreshed++
    }
    return { cacheEntriesRemoved, localStatusRefreshed }
  }

  /**
   * Batch completion hook: drops cached reports for every key the batch
   * touched and refreshes local status of affected volunteers
   */
  completionHook(): BatchCompletionHook {
    return async (batch, affectedKeys, store) => {
      const result = await this.invalidate(store, affectedKeys)
      this.logger.info('Derived status invalidated', {
        batchId: batch.id,
        keys: affectedKeys.length,
        ...result,
      })
    }
  }

  /**
   * Same invalidation for admin actions that relink entities
   */
  changeHook(): EntityChangeHook {
    return async (store, affectedKeys) => {
      const result = await this.invalidate(store, affectedKeys)
      this.logger.info('Derived status invalidated', {
        keys: affectedKeys.length,
        ...result,
      })
    }
  }

  private async occurrences(
    store: CanonicalStore,
    teacherId: string
  ): Promise<SessionOccurrence[]> {
    const sessions = await store.eventTeachers.findMany({ teacherId })
    const events = new Map<string, CanonicalEvent | null>()
    const occurrences: SessionOccurrence[] = []
    for (const session of sessions) {
      if (!events.has(session.eventId)) {
        events.set(session.eventId, await store.events.findById(session.eventId))
      }
      const event = events.get(session.eventId)
      occurrences.push({ session, eventStart: event?.startDate || session.sessionStart })
    }
    return occurrences
  }
}
