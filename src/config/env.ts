import path from "path"
import { ValidationError } from "../utils/errors"

export type Config = {
    dataDir: string
    reminderPollMs: number
    focusMins: number
    breakMins: number
    quiet: boolean
}

function positive(name: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === "") return fallback
    const n = Number(raw)
    if (!Number.isFinite(n) || n <= 0) throw new ValidationError(name, `expected a positive number, got "${raw}"`)
    return n
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    return Object.freeze({
        dataDir: env.ASSISTANT_DATA_DIR || path.join(process.cwd(), "storage", "assistant"),
        reminderPollMs: positive("ASSISTANT_REMINDER_POLL_MS", env.ASSISTANT_REMINDER_POLL_MS, 60000),
        focusMins: positive("ASSISTANT_FOCUS_MINS", env.ASSISTANT_FOCUS_MINS, 25),
        breakMins: positive("ASSISTANT_BREAK_MINS", env.ASSISTANT_BREAK_MINS, 5),
        quiet: env.ASSISTANT_QUIET === "1",
    })
}

export const config = loadConfig()
