import { addDays } from "../../utils/days"
import { Habit } from "../store/types"

export type HabitSummary = {
    streak: number
    longest: number
    doneToday: boolean
    total: number
}

export function streakOf(completions: readonly string[], today: string): number {
    const set = new Set(completions)
    let n = 0
    let d = today
    while (set.has(d)) {
        n++
        d = addDays(d, -1)
    }
    return n
}

export function longestStreak(completions: readonly string[]): number {
    const days = [...new Set(completions)].sort()
    let best = 0
    let run = 0
    let prev = ""
    for (const d of days) {
        run = prev && addDays(prev, 1) === d ? run + 1 : 1
        best = Math.max(best, run)
        prev = d
    }
    return best
}

export function summarize(habit: Habit, today: string): HabitSummary {
    return {
        streak: streakOf(habit.completions, today),
        longest: longestStreak(habit.completions),
        doneToday: habit.completions.includes(today),
        total: habit.completions.length,
    }
}
