import { describe, it, expect } from "vitest";
import { HORIZON_END } from "../config.js";
import { mondayOf, plusDays, utcDay } from "../dates.js";
import { buildSchedules } from "../scheduler.js";

const WEDNESDAY = new Date("2025-09-17T10:00:00Z");

describe("buildSchedules", () => {
  const weeks = buildSchedules({ today: WEDNESDAY });

  it("covers every Monday from next week up to the horizon", () => {
    expect(weeks).toHaveLength(41);
    expect(weeks[0].week_start).toBe("2025-09-22");
    expect(weeks[40].week_start).toBe("2026-06-29");
    weeks.forEach((w, i) => {
      if (i > 0) expect(w.week_start).toBe(plusDays(weeks[i - 1].week_start, 7));
    });
  });

  it("stops at the last Monday on or before the horizon", () => {
    const last = weeks[weeks.length - 1].week_start;
    expect(last <= HORIZON_END).toBe(true);
    expect(plusDays(last, 7) > HORIZON_END).toBe(true);
  });

  it("never includes the current week", () => {
    expect(weeks[0].week_start > mondayOf(utcDay(WEDNESDAY))).toBe(true);
  });

  it("skips the current week when today is Monday", () => {
    const result = buildSchedules({ today: new Date("2026-06-15T08:00:00Z") });
    expect(result.map(w => w.week_start)).toEqual(["2026-06-22", "2026-06-29"]);
  });

  it("starts the next day when today is Sunday", () => {
    const result = buildSchedules({ today: new Date("2026-06-28T20:00:00Z") });
    expect(result.map(w => w.week_start)).toEqual(["2026-06-29"]);
  });

  it("returns nothing once the next Monday is past the horizon", () => {
    expect(buildSchedules({ today: new Date("2026-06-29T08:00:00Z") })).toEqual([]);
    expect(buildSchedules({ today: new Date("2026-10-18T08:00:00Z") })).toEqual([]);
  });

  it("fills week metadata from the Monday", () => {
    expect(weeks[0]).toMatchObject({ week_end: "2025-09-28", week_number: 39, year: 2025 });
    expect(weeks[14]).toMatchObject({ week_start: "2025-12-29", week_end: "2026-01-04", week_number: 1, year: 2025 });
    expect(weeks[40]).toMatchObject({ week_end: "2026-07-05", week_number: 27, year: 2026 });
  });

  it("keeps pairs together in different main areas", () => {
    for (const w of weeks) {
      expect(w.joan_area).toBe(w.mery_area);
      expect(w.paco_area).toBe(w.belen_area);
      expect(w.joan_area).not.toBe(w.paco_area);
    }
    expect(weeks[0].joan_area).toBe("cocina");
    expect(weeks[0].paco_area).toBe("salon_pasillo");
    expect(weeks[1].joan_area).toBe("salon_pasillo");
    expect(weeks[1].paco_area).toBe("cocina");
  });

  it("alternates bathroom duty within each pair by week parity", () => {
    weeks.forEach((w, i) => {
      const even = i % 2 === 0;
      expect(w.joan_bano).toBe(even);
      expect(w.paco_bano).toBe(even);
      expect(w.mery_bano).toBe(!even);
      expect(w.belen_bano).toBe(!even);
    });
  });

  it("emits four main tasks followed by the two bathroom tasks", () => {
    const summary = (i: number) => weeks[i].tasks.map(t => `${t.person}:${t.area}:${t.task_type}`);
    expect(summary(0)).toEqual([
      "joan:cocina:limpieza_principal",
      "mery:cocina:limpieza_principal",
      "paco:salon_pasillo:limpieza_principal",
      "belen:salon_pasillo:limpieza_principal",
      "joan:bano_joan_mery:limpieza_bano",
      "paco:bano_paco_belen:limpieza_bano",
    ]);
    expect(summary(1)).toEqual([
      "joan:salon_pasillo:limpieza_principal",
      "mery:salon_pasillo:limpieza_principal",
      "paco:cocina:limpieza_principal",
      "belen:cocina:limpieza_principal",
      "mery:bano_joan_mery:limpieza_bano",
      "belen:bano_paco_belen:limpieza_bano",
    ]);
  });

  it("creates incomplete tasks tagged with their week", () => {
    for (const w of weeks) {
      for (const t of w.tasks) {
        expect(t.week_start).toBe(w.week_start);
        expect(t.limpieza_completada).toBe(false);
        expect(t.completed_at).toBeNull();
      }
    }
  });

  it("keeps the task key unique within a week", () => {
    for (const w of weeks) {
      const keys = new Set(w.tasks.map(t => `${t.person}|${t.area}|${t.task_type}`));
      expect(keys.size).toBe(w.tasks.length);
    }
  });

  it("gives every week and task its own id", () => {
    const ids = weeks.flatMap(w => [w.id, ...w.tasks.map(t => t.id)]);
    expect(new Set(ids).size).toBe(ids.length);
  });
});
