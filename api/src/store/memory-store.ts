import type { TaskKey, WeekSchedule } from "../scheduler.js";
import type { ScheduleStore } from "./store.js";

const byWeekStart = (a: WeekSchedule, b: WeekSchedule) => a.week_start.localeCompare(b.week_start);

// In-process stand-in for the MongoDB collection. Hands out copies only.
export class MemoryScheduleStore implements ScheduleStore {
  private schedules: WeekSchedule[] = [];

  async deleteAll(): Promise<number> {
    const count = this.schedules.length;
    this.schedules = [];
    return count;
  }

  async insertAll(schedules: WeekSchedule[]): Promise<number> {
    this.schedules.push(...structuredClone(schedules));
    return schedules.length;
  }

  async findByWeekStart(weekStart: string): Promise<WeekSchedule | null> {
    const found = this.schedules.find(s => s.week_start === weekStart);
    return found ? structuredClone(found) : null;
  }

  async findEarliest(): Promise<WeekSchedule | null> {
    const [first] = [...this.schedules].sort(byWeekStart);
    return first ? structuredClone(first) : null;
  }

  async listAll(): Promise<WeekSchedule[]> {
    return structuredClone([...this.schedules].sort(byWeekStart));
  }

  async setTaskCompletion(key: TaskKey, completed: boolean, completedAt: string | null): Promise<boolean> {
    const task = this.schedules
      .find(s => s.week_start === key.week_start)
      ?.tasks.find(t => t.person === key.person && t.area === key.area && t.task_type === key.task_type);
    if (!task) return false;
    task.limpieza_completada = completed;
    task.completed_at = completedAt;
    return true;
  }

  async close(): Promise<void> {}
}
