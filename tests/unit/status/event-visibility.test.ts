import { describe, it, expect } from 'vitest'
import { newEntity } from '../../../src/importers/shared.js'
import { eventEnd, isPubliclyVisible } from '../../../src/status/event-visibility.js'
import type { CanonicalEvent } from '../../../src/types/entities.js'

const now = new Date('2025-10-01T12:00:00Z')

function event(fields: Partial<CanonicalEvent>): CanonicalEvent {
  const stamp = '2025-08-01T00:00:00.000Z'
  return {
    ...newEntity.event({ id: 'event-1', createdAt: stamp, updatedAt: stamp, externalIds: {} }),
    title: 'Career Day',
    startDate: '2025-10-01T13:00:00.000Z',
    status: 'Published',
    publicVisibility: true,
    ...fields,
  }
}

describe('eventEnd', () => {
  it('prefers the end date', () => {
    expect(
      eventEnd({
        startDate: '2025-10-01T13:00:00.000Z',
        endDate: '2025-10-01T15:00:00.000Z',
        durationMinutes: 30,
      })
    ).toBe(Date.parse('2025-10-01T15:00:00.000Z'))
  })

  it('adds the duration to the start', () => {
    expect(eventEnd({ startDate: '2025-10-01T13:00:00.000Z', durationMinutes: 90 })).toBe(
      Date.parse('2025-10-01T14:30:00.000Z')
    )
  })

  it('falls back to the start', () => {
    expect(eventEnd({ startDate: '2025-10-01T13:00:00.000Z' })).toBe(
      Date.parse('2025-10-01T13:00:00.000Z')
    )
  })
})

describe('isPubliclyVisible', () => {
  it('shows a published event that has not ended', () => {
    expect(isPubliclyVisible(event({}), now)).toBe(true)
  })

  it('hides events with the toggle off', () => {
    expect(isPubliclyVisible(event({ publicVisibility: false }), now)).toBe(false)
  })

  it('hides cancelled events', () => {
    expect(isPubliclyVisible(event({ status: 'Cancelled' }), now)).toBe(false)
  })

  it('hides events that have ended', () => {
    expect(
      isPubliclyVisible(event({ startDate: '2025-10-01T11:00:00.000Z', durationMinutes: 60 }), now)
    ).toBe(false)
    expect(isPubliclyVisible(event({ startDate: '2025-10-01T12:00:00.000Z' }), now)).toBe(false)
  })

  it('keeps an event visible while it is running', () => {
    expect(
      isPubliclyVisible(event({ startDate: '2025-10-01T11:00:00.000Z', durationMinutes: 90 }), now)
    ).toBe(true)
  })

  it('hides events without a usable start', () => {
    expect(isPubliclyVisible(event({ startDate: '' }), now)).toBe(false)
  })
})
