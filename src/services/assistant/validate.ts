import { isDay } from "../../utils/days"
import { ValidationError } from "../../utils/errors"
import { isId, isTime } from "../store/schema"

export function text(field: string, v: unknown): string {
    if (typeof v !== "string" || !v.trim()) throw new ValidationError(field, "must not be empty")
    return v.trim()
}

export function id(field: string, v: unknown): number {
    if (!isId(v)) throw new ValidationError(field, "must be a positive integer")
    return v
}

export function time(field: string, v: unknown): number {
    if (!isTime(v)) throw new ValidationError(field, "must be a non-negative timestamp in ms")
    return v
}

export function duration(field: string, v: unknown): number {
    if (typeof v !== "number" || !Number.isFinite(v) || v <= 0) throw new ValidationError(field, "must be a positive number")
    return v
}

export function day(field: string, v: unknown): string {
    if (!isDay(v)) throw new ValidationError(field, "must be a YYYY-MM-DD date")
    return v
}
