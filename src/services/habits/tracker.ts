import { isDay } from "../../utils/days"
import { ValidationError } from "../../utils/errors"
import { RecordStore } from "../store"
import { Habit } from "../store/types"
import { streakOf } from "./streaks"

function checkDay(day: string) {
    if (!isDay(day)) throw new ValidationError("day", `expected YYYY-MM-DD, got "${day}"`)
}

/** Completion bookkeeping for habits. "today" is always passed in, never read from the clock. */
export class HabitTracker {
    constructor(private readonly store: RecordStore) { }

    async markDone(habitId: number, day: string): Promise<Habit> {
        checkDay(day)
        return this.store.modify("habit", habitId, h =>
            h.completions.includes(day) ? null : { completions: [...h.completions, day].sort() })
    }

    async unmark(habitId: number, day: string): Promise<Habit> {
        checkDay(day)
        return this.store.modify("habit", habitId, h =>
            h.completions.includes(day) ? { completions: h.completions.filter(d => d !== day) } : null)
    }

    streak(habitId: number, today: string): number {
        checkDay(today)
        return streakOf(this.store.get("habit", habitId).completions, today)
    }
}
