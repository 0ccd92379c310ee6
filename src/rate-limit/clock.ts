export interface Clock {
  now(): Date
}

export const CLOCK = Symbol('CLOCK')

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }
}

/** `YYYY-MM-DD` of the given instant, in UTC. */
export function utcDayKey(d: Date): string {
  return d.toISOString().slice(0, 10)
}

export function nextUtcMidnightIso(d: Date): string {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate() + 1)).toISOString()
}
