import { config } from "../../config/env"
import { scoped } from "../../utils/log"
import { RecordStore } from "../store"
import { Reminder } from "../store/types"
import { Clock } from "../timer/engine"

const log = scoped("reminders")

const byFireAt = (a: Reminder, b: Reminder) => a.fireAt - b.fireAt || a.id - b.id

export type PollOptions = {
    onDue: (due: Reminder[]) => void
    onError?: (e: unknown) => void
    intervalMs?: number
    clock?: Clock
}

export class ReminderScheduler {
    constructor(private readonly store: RecordStore) { }

    /**
     * Returns reminders due at `now` and marks them fired in the same locked
     * write, so a reminder is handed out at most once however often this runs.
     */
    async checkDue(now: number): Promise<Reminder[]> {
        const due = await this.store.updateWhere("reminder", r => !r.fired && r.fireAt <= now, { fired: true })
        if (due.length) log("due", due.map(r => r.id))
        return due.sort(byFireAt)
    }

    upcoming(now: number): Reminder[] {
        return this.store.list("reminder").filter(r => !r.fired && r.fireAt > now).sort(byFireAt)
    }

    reschedule(id: number, fireAt: number): Promise<Reminder> {
        return this.store.update("reminder", id, { fireAt, fired: false })
    }

    /** Polls checkDue on an interval until the returned function is called. */
    startPolling(opts: PollOptions): () => void {
        const clock = opts.clock ?? Date.now
        let busy = false
        const timer = setInterval(async () => {
            if (busy) return
            busy = true
            try {
                const due = await this.checkDue(clock())
                if (due.length) opts.onDue(due)
            } catch (e) {
                if (opts.onError) opts.onError(e)
                else log.warn("poll failed", e)
            } finally {
                busy = false
            }
        }, opts.intervalMs ?? config.reminderPollMs)
        timer.unref()
        return () => clearInterval(timer)
    }
}
