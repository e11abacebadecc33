import { InvalidTransition, ValidationError } from "../../utils/errors"

export type TimerState = "idle" | "running" | "paused" | "completed"

export type TimerSession = {
    state: TimerState
    durationSeconds: number
    remainingSeconds: number
}

export type Clock = () => number

function checkNow(now: number) {
    if (!Number.isFinite(now)) throw new ValidationError("now", "must be a finite timestamp in ms")
}

/**
 * Single countdown session. Remaining time is always derived from the last
 * anchor (start or resume) and the wall clock, never decremented per tick, so
 * irregular polling cannot drift it.
 */
export class TimerEngine {
    private state: TimerState = "idle"
    private duration = 0
    private remaining = 0
    // wall-clock ms at which `anchorRemaining` seconds were left
    private anchorAt = 0
    private anchorRemaining = 0

    constructor(private readonly clock: Clock = Date.now) { }

    start(durationSeconds: number, now = this.clock()): TimerSession {
        if (this.state !== "idle" && this.state !== "completed") throw new InvalidTransition(this.state, "start")
        if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
            throw new ValidationError("durationSeconds", "must be a positive number")
        }
        checkNow(now)
        this.duration = durationSeconds
        this.remaining = durationSeconds
        this.anchor(now)
        this.state = "running"
        return this.snapshot()
    }

    /** Throws InvalidTransition if the session turns out to have completed by `now`. */
    pause(now = this.clock()): TimerSession {
        if (this.state !== "running") throw new InvalidTransition(this.state, "pause")
        checkNow(now)
        const { state } = this.tick(now)
        if (state === "completed") throw new InvalidTransition(state, "pause")
        this.state = "paused"
        return this.snapshot()
    }

    resume(now = this.clock()): TimerSession {
        if (this.state !== "paused") throw new InvalidTransition(this.state, "resume")
        checkNow(now)
        this.anchor(now)
        this.state = "running"
        return this.snapshot()
    }

    tick(now = this.clock()): TimerSession {
        checkNow(now)
        if (this.state !== "running") return this.snapshot()
        const left = this.anchorRemaining - (now - this.anchorAt) / 1000
        this.remaining = Math.min(this.remaining, Math.max(0, left))
        if (this.remaining <= 0) {
            this.remaining = 0
            this.state = "completed"
        }
        return this.snapshot()
    }

    reset(): TimerSession {
        this.state = "idle"
        this.duration = 0
        this.remaining = 0
        return this.snapshot()
    }

    snapshot(): TimerSession {
        return { state: this.state, durationSeconds: this.duration, remainingSeconds: this.remaining }
    }

    private anchor(now: number) {
        this.anchorAt = now
        this.anchorRemaining = this.remaining
    }
}
