import { isAssistantError } from "../../utils/errors"

/** User-facing text for a failed operation. Corrupt-store details are always kept. */
export function describeError(e: unknown): string {
    if (!isAssistantError(e)) return e instanceof Error ? e.message : String(e)
    switch (e.code) {
        case "not_found":
            return `Not found: ${e.message}`
        case "validation":
            return `Invalid input: ${e.message}`
        case "invalid_transition":
            return `Timer: ${e.message}`
        case "corrupt_store":
            return `Saved data could not be read and was left untouched. ${e.message}`
    }
}
