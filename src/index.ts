export { Assistant } from "./services/assistant"
export type { AssistantOptions, HabitView, PomodoroPhase, TaskFilter } from "./services/assistant"
export { describeError } from "./services/assistant/messages"
export { RecordStore } from "./services/store"
export type { Habit, Note, RecordKind, RecordMap, Reminder, Task } from "./services/store/types"
export { HabitTracker } from "./services/habits/tracker"
export { longestStreak, streakOf, summarize } from "./services/habits/streaks"
export type { HabitSummary } from "./services/habits/streaks"
export { TimerEngine } from "./services/timer/engine"
export type { Clock, TimerSession, TimerState } from "./services/timer/engine"
export { ReminderScheduler } from "./services/reminders/scheduler"
export { createDb } from "./utils/database/keyv"
export { config, loadConfig } from "./config/env"
export * from "./utils/errors"
