// Calendar days are UTC "YYYY-MM-DD" strings throughout.

const DAY_MS = 24 * 3600 * 1000
const DAY_RE = /^\d{4}-\d{2}-\d{2}$/

export const dayOf = (ms: number): string => new Date(ms).toISOString().slice(0, 10)

export function isDay(s: unknown): s is string {
    if (typeof s !== "string" || !DAY_RE.test(s)) return false
    const t = Date.parse(s + "T00:00:00Z")
    return Number.isFinite(t) && dayOf(t) === s
}

export function addDays(day: string, n: number): string {
    return dayOf(Date.parse(day + "T00:00:00Z") + n * DAY_MS)
}

export function dayBounds(day: string): { start: number; end: number } {
    const start = Date.parse(day + "T00:00:00Z")
    return { start, end: start + DAY_MS }
}
