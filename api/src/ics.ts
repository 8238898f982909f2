import { createEvents, type EventAttributes } from "ics";
import { AREA_LABELS, PERSON_LABELS, type Person } from "./config.js";
import { dayParts } from "./dates.js";
import type { Task, WeekSchedule } from "./scheduler.js";

// One event per task, on the Monday of its week
export function buildPersonCalendar(
  person: Person,
  entries: { week: WeekSchedule; task: Task }[],
  startTime: string,
): string {
  const [hh, mm] = startTime.split(":").map(x => parseInt(x, 10));

  const events = entries.map(({ week, task }): EventAttributes => {
    const [y, m, d] = dayParts(week.week_start);
    return {
      uid: `${task.id}@casa-limpia`,
      title: `Limpieza – ${AREA_LABELS[task.area]}`,
      description: `Semana ${week.week_number} (${week.week_start} – ${week.week_end}) · ${PERSON_LABELS[person]}`,
      start: [y, m, d, hh, mm || 0],
      startInputType: "local",
      startOutputType: "local",
      duration: { hours: 1 },
      status: task.limpieza_completada ? "CONFIRMED" : "TENTATIVE",
    };
  });

  const { error, value } = createEvents(events);
  if (error || value === undefined) {
    throw new Error(`Could not build calendar for ${person}: ${error?.message ?? "empty output"}`);
  }
  return value;
}
