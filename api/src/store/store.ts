import type { TaskKey, WeekSchedule } from "../scheduler.js";

/**
 * Persistence for week schedules. Every method is a single storage call;
 * implementations report driver failures as `StorageError`.
 */
export interface ScheduleStore {
  /** Removes every schedule and returns how many there were. */
  deleteAll(): Promise<number>;
  insertAll(schedules: WeekSchedule[]): Promise<number>;
  findByWeekStart(weekStart: string): Promise<WeekSchedule | null>;
  /** Schedule with the smallest week_start. */
  findEarliest(): Promise<WeekSchedule | null>;
  /** Ordered by week_start ascending. */
  listAll(): Promise<WeekSchedule[]>;
  /** Updates the one task matching `key`; false when no week or task matches. */
  setTaskCompletion(key: TaskKey, completed: boolean, completedAt: string | null): Promise<boolean>;
  close(): Promise<void>;
}
