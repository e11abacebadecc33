import { config } from "../config/env"

export type Log = (...a: unknown[]) => void

export function scoped(tag: string): Log & { warn: Log } {
    const log = (...a: unknown[]) => {
        if (!config.quiet) console.log(`[${tag}]`, ...a)
    }
    const warn = (...a: unknown[]) => {
        if (!config.quiet) console.warn(`[${tag}]`, ...a)
    }
    return Object.assign(log, { warn })
}
