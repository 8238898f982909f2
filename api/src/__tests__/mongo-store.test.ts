import mongoose from "mongoose";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { StorageError } from "../errors.js";
import type { WeekSchedule } from "../scheduler.js";
import { buildSchedules } from "../scheduler.js";
import { COLLECTION, MongoScheduleStore, WeekScheduleSchema, toWeekSchedule } from "../store/mongo-store.js";

// Validation and mapping only; nothing here talks to a server
const WeekScheduleModel = mongoose.model<WeekSchedule>("WeekScheduleSchemaCheck", WeekScheduleSchema);

describe("WeekScheduleSchema", () => {
  const [week] = buildSchedules({ today: new Date("2025-09-17T10:00:00Z") });

  it("stores schedules in the week_schedules collection", () => {
    expect(COLLECTION).toBe("week_schedules");
    expect(WeekScheduleModel.collection.collectionName).toBe("week_schedules");
  });

  it("accepts generated schedules", () => {
    expect(new WeekScheduleModel(week).validateSync()).toBeFalsy();
  });

  it("rejects values outside the enumerations", () => {
    const doc = new WeekScheduleModel({ ...week, tasks: [{ ...week.tasks[0], person: "nobody" }] });
    const err = doc.validateSync();
    expect(err?.errors["tasks.0.person"]).toBeDefined();
  });

  it("rejects a bathroom as main area", () => {
    const doc = new WeekScheduleModel({ ...week, joan_area: "bano_joan_mery" });
    expect(doc.validateSync()?.errors["joan_area"]).toBeDefined();
  });

  it("maps stored documents back without storage fields", () => {
    const stored = new WeekScheduleModel(week).toObject();
    expect(stored._id).toBeDefined();
    const mapped = toWeekSchedule(stored);
    expect(mapped).toEqual(week);
    expect(Object.keys(mapped)).not.toContain("_id");
  });
});

describe("MongoScheduleStore queries", () => {
  // Never connected: every query stops at the stubbed exec
  const store = new MongoScheduleStore(mongoose.createConnection());
  let executed: mongoose.Query<unknown, unknown>[];
  let result: unknown;

  beforeEach(() => {
    executed = [];
    result = null;
    vi.spyOn(mongoose.Query.prototype, "exec").mockImplementation(function (this: mongoose.Query<unknown, unknown>) {
      executed.push(this);
      return Promise.resolve(result);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("completes a task through $elemMatch and the positional operator", async () => {
    result = { matchedCount: 1 };
    const key = { week_start: "2025-09-22", person: "paco", area: "salon_pasillo", task_type: "limpieza_principal" } as const;

    await expect(store.setTaskCompletion(key, true, "2025-09-17T10:00:00.000+00:00")).resolves.toBe(true);

    expect(executed).toHaveLength(1);
    expect(executed[0].getFilter()).toEqual({
      week_start: "2025-09-22",
      tasks: { $elemMatch: { person: "paco", area: "salon_pasillo", task_type: "limpieza_principal" } },
    });
    expect(executed[0].getUpdate()).toEqual({
      $set: { "tasks.$.limpieza_completada": true, "tasks.$.completed_at": "2025-09-17T10:00:00.000+00:00" },
    });
  });

  it("reports a task that matched nothing", async () => {
    result = { matchedCount: 0 };
    const key = { week_start: "2030-01-07", person: "mery", area: "cocina", task_type: "limpieza_principal" } as const;
    await expect(store.setTaskCompletion(key, false, null)).resolves.toBe(false);
    expect(executed[0].getUpdate()).toEqual({
      $set: { "tasks.$.limpieza_completada": false, "tasks.$.completed_at": null },
    });
  });

  it("reads the earliest week in week_start order", async () => {
    await expect(store.findEarliest()).resolves.toBeNull();
    expect(executed[0].getFilter()).toEqual({});
    expect(executed[0].getOptions().sort).toEqual({ week_start: 1 });
  });

  it("lists every week in week_start order", async () => {
    result = [];
    await expect(store.listAll()).resolves.toEqual([]);
    expect(executed[0].getFilter()).toEqual({});
    expect(executed[0].getOptions().sort).toEqual({ week_start: 1 });
  });

  it("wraps driver failures in StorageError and keeps the cause", async () => {
    const driverErr = new Error("connection reset");
    vi.mocked(mongoose.Query.prototype.exec).mockRejectedValueOnce(driverErr);

    const failure = store.findEarliest();
    await expect(failure).rejects.toBeInstanceOf(StorageError);
    await expect(failure).rejects.toMatchObject({
      message: "find earliest schedule: connection reset",
      cause: driverErr,
    });
  });
});
