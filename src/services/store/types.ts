export type Task = {
    id: number
    title: string
    done: boolean
    createdAt: number
    dueAt?: number
}

export type Habit = {
    id: number
    name: string
    completions: string[]
}

export type Note = {
    id: number
    text: string
    createdAt: number
}

export type Reminder = {
    id: number
    message: string
    fireAt: number
    fired: boolean
}

export type RecordMap = {
    task: Task
    habit: Habit
    note: Note
    reminder: Reminder
}

export type RecordKind = keyof RecordMap

export type Fields<K extends RecordKind> = Omit<RecordMap[K], "id">

export type Patch<K extends RecordKind> = Partial<Fields<K>>

/** On-disk shape of one collection document. */
export type CollectionDoc<T> = {
    nextId: number
    records: T[]
}
