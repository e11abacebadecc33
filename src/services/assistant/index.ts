import { config } from "../../config/env"
import { createDb, Db } from "../../utils/database/keyv"
import { dayBounds, dayOf } from "../../utils/days"
import { scoped } from "../../utils/log"
import { HabitTracker } from "../habits/tracker"
import { HabitSummary, summarize } from "../habits/streaks"
import { ReminderScheduler } from "../reminders/scheduler"
import { RecordStore } from "../store"
import { Habit, Note, Reminder, Task } from "../store/types"
import { Clock, TimerEngine, TimerSession } from "../timer/engine"
import * as v from "./validate"

const log = scoped("assistant")

export type AssistantOptions = {
    dataDir?: string
    db?: Db
    clock?: Clock
}

export type TaskFilter = { done?: boolean; dueBefore?: number }

export type PomodoroPhase = "focus" | "break"

export type HabitView = Habit & { streak: number }

/**
 * The operations a presentation layer calls. Input is validated here before
 * anything reaches the store; store and timer errors pass through unchanged.
 */
export class Assistant {
    readonly habits: HabitTracker
    readonly reminders: ReminderScheduler
    private readonly engine: TimerEngine

    private constructor(readonly store: RecordStore, private readonly clock: Clock) {
        this.habits = new HabitTracker(store)
        this.reminders = new ReminderScheduler(store)
        this.engine = new TimerEngine(clock)
    }

    static async open(opts: AssistantOptions = {}): Promise<Assistant> {
        const db = opts.db ?? createDb(opts.dataDir ?? config.dataDir)
        const store = await RecordStore.open(db)
        return new Assistant(store, opts.clock ?? Date.now)
    }

    private today() {
        return dayOf(this.clock())
    }

    // tasks

    async createTask(title: string, dueAt?: number): Promise<Task> {
        const t = v.text("title", title)
        const fields = { title: t, done: false, createdAt: this.clock() }
        return this.store.create("task", dueAt === undefined ? fields : { ...fields, dueAt: v.time("dueAt", dueAt) })
    }

    getTask(id: number): Task {
        return this.store.get("task", v.id("id", id))
    }

    async toggleTask(id: number): Promise<Task> {
        return this.store.modify("task", v.id("id", id), t => ({ done: !t.done }))
    }

    async setTaskDone(id: number, done: boolean): Promise<Task> {
        return this.store.update("task", v.id("id", id), { done })
    }

    async renameTask(id: number, title: string): Promise<Task> {
        return this.store.update("task", v.id("id", id), { title: v.text("title", title) })
    }

    async deleteTask(id: number): Promise<true> {
        return this.store.delete("task", v.id("id", id))
    }

    listTasks(filter: TaskFilter = {}): Task[] {
        const dueBefore = filter.dueBefore === undefined ? undefined : v.time("dueBefore", filter.dueBefore)
        return this.store.list("task").filter(t => {
            if (filter.done !== undefined && t.done !== filter.done) return false
            if (dueBefore !== undefined && (t.dueAt === undefined || t.dueAt > dueBefore)) return false
            return true
        })
    }

    tasksDueOn(day: string = this.today()): Task[] {
        const { start, end } = dayBounds(v.day("day", day))
        return this.store.list("task")
            .filter(t => t.dueAt !== undefined && t.dueAt >= start && t.dueAt < end)
            .sort((a, b) => (a.dueAt ?? 0) - (b.dueAt ?? 0))
    }

    // habits

    async createHabit(name: string): Promise<Habit> {
        return this.store.create("habit", { name: v.text("name", name), completions: [] })
    }

    async markHabit(id: number, day: string = this.today()): Promise<Habit> {
        return this.habits.markDone(v.id("id", id), v.day("day", day))
    }

    async unmarkHabit(id: number, day: string = this.today()): Promise<Habit> {
        return this.habits.unmark(v.id("id", id), v.day("day", day))
    }

    habitStreak(id: number, today: string = this.today()): number {
        return this.habits.streak(v.id("id", id), v.day("today", today))
    }

    habitSummary(id: number, today: string = this.today()): HabitSummary {
        return summarize(this.store.get("habit", v.id("id", id)), v.day("today", today))
    }

    listHabits(today: string = this.today()): HabitView[] {
        const d = v.day("today", today)
        return this.store.list("habit").map(h => ({ ...h, streak: summarize(h, d).streak }))
    }

    async deleteHabit(id: number): Promise<true> {
        return this.store.delete("habit", v.id("id", id))
    }

    // notes

    async addNote(text: string): Promise<Note> {
        v.text("text", text)
        return this.store.create("note", { text, createdAt: this.clock() })
    }

    async replaceNoteText(id: number, text: string): Promise<Note> {
        v.text("text", text)
        return this.store.update("note", v.id("id", id), { text })
    }

    getNote(id: number): Note {
        return this.store.get("note", v.id("id", id))
    }

    listNotes(): Note[] {
        return this.store.list("note")
    }

    async deleteNote(id: number): Promise<true> {
        return this.store.delete("note", v.id("id", id))
    }

    // reminders

    async addReminder(message: string, fireAt: number): Promise<Reminder> {
        return this.store.create("reminder", { message: v.text("message", message), fireAt: v.time("fireAt", fireAt), fired: false })
    }

    async pollReminders(now: number = this.clock()): Promise<Reminder[]> {
        return this.reminders.checkDue(v.time("now", now))
    }

    async rescheduleReminder(id: number, fireAt: number): Promise<Reminder> {
        return this.reminders.reschedule(v.id("id", id), v.time("fireAt", fireAt))
    }

    listReminders(): Reminder[] {
        return this.store.list("reminder")
    }

    async deleteReminder(id: number): Promise<true> {
        return this.store.delete("reminder", v.id("id", id))
    }

    // timer

    startTimer(seconds: number): TimerSession {
        return this.engine.start(v.duration("seconds", seconds))
    }

    startPomodoro(phase: PomodoroPhase = "focus"): TimerSession {
        const mins = phase === "focus" ? config.focusMins : config.breakMins
        return this.startTimer(mins * 60)
    }

    pauseTimer(): TimerSession {
        return this.engine.pause()
    }

    resumeTimer(): TimerSession {
        return this.engine.resume()
    }

    tickTimer(now: number = this.clock()): TimerSession {
        const before = this.engine.snapshot().state
        const s = this.engine.tick(v.time("now", now))
        if (before === "running" && s.state === "completed") log("timer completed", { durationSeconds: s.durationSeconds })
        return s
    }

    resetTimer(): TimerSession {
        return this.engine.reset()
    }

    timer(): TimerSession {
        return this.engine.snapshot()
    }
}
