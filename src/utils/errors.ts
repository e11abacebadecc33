export type ErrorCode = "not_found" | "validation" | "corrupt_store" | "invalid_transition"

export class AssistantError extends Error {
    readonly code: ErrorCode

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
        this.code = code
    }
}

export class NotFound extends AssistantError {
    constructor(readonly kind: string, readonly id: number) {
        super("not_found", `${kind} ${id} not found`)
    }
}

export class ValidationError extends AssistantError {
    constructor(readonly field: string, message: string) {
        super("validation", `${field}: ${message}`)
    }
}

/** A persisted document could not be read back. Never recovered from silently. */
export class CorruptStore extends AssistantError {
    constructor(readonly kind: string, detail: string, cause?: unknown) {
        super("corrupt_store", `${kind} store is corrupt: ${detail}`, { cause })
    }
}

export class InvalidTransition extends AssistantError {
    constructor(readonly from: string, readonly action: string) {
        super("invalid_transition", `cannot ${action} a timer that is ${from}`)
    }
}

export const isAssistantError = (e: unknown): e is AssistantError => e instanceof AssistantError
