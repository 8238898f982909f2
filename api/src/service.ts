import type { Person } from "./config.js";
import { mondayOf, utcDay, utcTimestamp } from "./dates.js";
import { NotFoundError } from "./errors.js";
import { logger } from "./logger.js";
import { buildSchedules, type Task, type TaskKey, type WeekSchedule } from "./scheduler.js";
import type { ScheduleStore } from "./store/store.js";

export type TaskCompletionUpdate = TaskKey & { completed: boolean };

export type GenerateResult = { created: number; from: string | null; to: string | null };

export type Clock = () => Date;

export class ScheduleService {
  constructor(
    private readonly store: ScheduleStore,
    private readonly clock: Clock = () => new Date(),
  ) {}

  // Full replace. Readers between the delete and the insert see an empty collection.
  async generate(): Promise<GenerateResult> {
    const removed = await this.store.deleteAll();
    const schedules = buildSchedules({ today: this.clock() });
    const created = schedules.length > 0 ? await this.store.insertAll(schedules) : 0;
    const from = schedules.length > 0 ? schedules[0].week_start : null;
    const to = schedules.length > 0 ? schedules[schedules.length - 1].week_start : null;
    logger.info(`Regenerated schedules: removed=${removed} created=${created} from=${from} to=${to}`);
    return { created, from, to };
  }

  /** This week's schedule, or the earliest stored one when this week was never generated. */
  async currentWeek(): Promise<WeekSchedule> {
    const monday = mondayOf(utcDay(this.clock()));
    const schedule = (await this.store.findByWeekStart(monday)) ?? (await this.store.findEarliest());
    if (!schedule) throw new NotFoundError("No hay planificaciones disponibles");
    return schedule;
  }

  async completeTask({ completed, ...key }: TaskCompletionUpdate): Promise<void> {
    const completedAt = completed ? utcTimestamp(this.clock()) : null;
    const matched = await this.store.setTaskCompletion(key, completed, completedAt);
    if (!matched) throw new NotFoundError("Tarea no encontrada");
    logger.debug(`Task ${key.week_start}/${key.person}/${key.area}/${key.task_type} completed=${completed}`);
  }

  listAll(): Promise<WeekSchedule[]> {
    return this.store.listAll();
  }

  async deleteAll(): Promise<number> {
    const deleted = await this.store.deleteAll();
    logger.info(`Deleted ${deleted} schedules`);
    return deleted;
  }

  /** Stored tasks of one person, paired with their week, in week order. */
  async tasksOf(person: Person): Promise<{ week: WeekSchedule; task: Task }[]> {
    const weeks = await this.store.listAll();
    return weeks.flatMap(week => week.tasks.filter(t => t.person === person).map(task => ({ week, task })));
  }
}
