import mongoose, { Schema, type Connection, type Model } from "mongoose";
import { AREAS, MAIN_AREAS, PEOPLE, TASK_TYPES } from "../config.js";
import { StorageError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { Task, TaskKey, WeekSchedule } from "../scheduler.js";
import type { ScheduleStore } from "./store.js";

export const COLLECTION = "week_schedules";

const TaskSchema = new Schema<Task>(
  {
    id: { type: String, required: true },
    week_start: { type: String, required: true },
    person: { type: String, enum: [...PEOPLE], required: true },
    area: { type: String, enum: [...AREAS], required: true },
    task_type: { type: String, enum: [...TASK_TYPES], required: true },
    limpieza_completada: { type: Boolean, default: false },
    completed_at: { type: String, default: null },
  },
  { _id: false },
);

const mainArea = { type: String, enum: [...MAIN_AREAS], required: true };

// Tasks live inside their week; there is no separate task collection
export const WeekScheduleSchema = new Schema<WeekSchedule>(
  {
    id: { type: String, required: true },
    week_start: { type: String, required: true },
    week_end: { type: String, required: true },
    week_number: { type: Number, required: true, min: 1, max: 53 },
    year: { type: Number, required: true },
    joan_area: mainArea,
    mery_area: mainArea,
    paco_area: mainArea,
    belen_area: mainArea,
    joan_bano: { type: Boolean, required: true },
    mery_bano: { type: Boolean, required: true },
    paco_bano: { type: Boolean, required: true },
    belen_bano: { type: Boolean, required: true },
    tasks: { type: [TaskSchema], default: [] },
  },
  { collection: COLLECTION, versionKey: false },
);

WeekScheduleSchema.index({ week_start: 1 }, { unique: true });

const toTask = (t: Task): Task => ({
  id: t.id,
  week_start: t.week_start,
  person: t.person,
  area: t.area,
  task_type: t.task_type,
  limpieza_completada: t.limpieza_completada,
  completed_at: t.completed_at ?? null,
});

/** Strips storage fields (`_id`) from a stored document. */
export function toWeekSchedule(doc: WeekSchedule): WeekSchedule {
  return {
    id: doc.id,
    week_start: doc.week_start,
    week_end: doc.week_end,
    week_number: doc.week_number,
    year: doc.year,
    joan_area: doc.joan_area,
    mery_area: doc.mery_area,
    paco_area: doc.paco_area,
    belen_area: doc.belen_area,
    joan_bano: doc.joan_bano,
    mery_bano: doc.mery_bano,
    paco_bano: doc.paco_bano,
    belen_bano: doc.belen_bano,
    tasks: doc.tasks.map(toTask),
  };
}

async function guard<T>(action: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    throw new StorageError(`${action}: ${errorMessage(err)}`, { cause: err });
  }
}

export class MongoScheduleStore implements ScheduleStore {
  private readonly model: Model<WeekSchedule>;

  constructor(private readonly connection: Connection) {
    this.model = connection.model<WeekSchedule>("WeekSchedule", WeekScheduleSchema);
  }

  static async connect(url: string, dbName: string): Promise<MongoScheduleStore> {
    const connection = await guard("connect", () => mongoose.createConnection(url, { dbName }).asPromise());
    logger.info(`MongoDB connected (db=${dbName})`);
    return new MongoScheduleStore(connection);
  }

  deleteAll(): Promise<number> {
    return guard("delete schedules", async () => {
      const result = await this.model.deleteMany({}).exec();
      return result.deletedCount;
    });
  }

  insertAll(schedules: WeekSchedule[]): Promise<number> {
    return guard("insert schedules", async () => {
      const inserted = await this.model.insertMany(schedules);
      return inserted.length;
    });
  }

  findByWeekStart(weekStart: string): Promise<WeekSchedule | null> {
    return guard("find schedule", async () => {
      const doc = await this.model.findOne({ week_start: weekStart }).exec();
      return doc ? toWeekSchedule(doc.toObject()) : null;
    });
  }

  findEarliest(): Promise<WeekSchedule | null> {
    return guard("find earliest schedule", async () => {
      const doc = await this.model.findOne({}).sort({ week_start: 1 }).exec();
      return doc ? toWeekSchedule(doc.toObject()) : null;
    });
  }

  listAll(): Promise<WeekSchedule[]> {
    return guard("list schedules", async () => {
      const docs = await this.model.find({}).sort({ week_start: 1 }).exec();
      return docs.map(d => toWeekSchedule(d.toObject()));
    });
  }

  setTaskCompletion(key: TaskKey, completed: boolean, completedAt: string | null): Promise<boolean> {
    return guard("update task", async () => {
      const result = await this.model
        .updateOne(
          {
            week_start: key.week_start,
            tasks: { $elemMatch: { person: key.person, area: key.area, task_type: key.task_type } },
          },
          { $set: { "tasks.$.limpieza_completada": completed, "tasks.$.completed_at": completedAt } },
        )
        .exec();
      return result.matchedCount > 0;
    });
  }

  async close(): Promise<void> {
    await this.connection.close();
    logger.info("MongoDB connection closed");
  }
}
