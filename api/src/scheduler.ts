import { randomUUID } from "node:crypto";
import { HORIZON_END, MAIN_AREAS, PAIRS, type Area, type MainArea, type Person, type TaskType } from "./config.js";
import { calendarYear, isoWeekNumber, nextMonday, plusDays, utcDay } from "./dates.js";

export type Task = {
  id: string;
  week_start: string;            // Monday, YYYY-MM-DD
  person: Person;
  area: Area;
  task_type: TaskType;
  limpieza_completada: boolean;
  completed_at: string | null;   // ISO datetime with UTC offset
};

export type WeekSchedule = {
  id: string;
  week_start: string;
  week_end: string;
  week_number: number;
  year: number;
  joan_area: MainArea;
  mery_area: MainArea;
  paco_area: MainArea;
  belen_area: MainArea;
  joan_bano: boolean;
  mery_bano: boolean;
  paco_bano: boolean;
  belen_bano: boolean;
  tasks: Task[];
};

// Natural key of a task inside its week
export type TaskKey = Pick<Task, "week_start" | "person" | "area" | "task_type">;

type Assignment = { person: Person; mainArea: MainArea; bathroom: Area | null };

function assign(weekIndex: number): Assignment[] {
  const out: Assignment[] = [];
  PAIRS.forEach((pair, p) => {
    const mainArea = MAIN_AREAS[(weekIndex + p) % MAIN_AREAS.length];
    pair.members.forEach((person, m) => {
      out.push({ person, mainArea, bathroom: weekIndex % 2 === m ? pair.bathroom : null });
    });
  });
  return out;
}

function task(weekStart: string, person: Person, area: Area, taskType: TaskType): Task {
  return {
    id: randomUUID(),
    week_start: weekStart,
    person,
    area,
    task_type: taskType,
    limpieza_completada: false,
    completed_at: null,
  };
}

function buildWeek(monday: string, weekIndex: number): WeekSchedule {
  const slots = assign(weekIndex);
  const byPerson = new Map(slots.map(s => [s.person, s]));
  const slot = (person: Person): Assignment => {
    const s = byPerson.get(person);
    if (!s) throw new Error(`No assignment for ${person}`);
    return s;
  };

  const tasks = [
    ...slots.map(s => task(monday, s.person, s.mainArea, "limpieza_principal")),
    ...slots.flatMap(s => (s.bathroom ? [task(monday, s.person, s.bathroom, "limpieza_bano")] : [])),
  ];

  return {
    id: randomUUID(),
    week_start: monday,
    week_end: plusDays(monday, 6),
    week_number: isoWeekNumber(monday),
    year: calendarYear(monday),
    joan_area: slot("joan").mainArea,
    mery_area: slot("mery").mainArea,
    paco_area: slot("paco").mainArea,
    belen_area: slot("belen").mainArea,
    joan_bano: slot("joan").bathroom !== null,
    mery_bano: slot("mery").bathroom !== null,
    paco_bano: slot("paco").bathroom !== null,
    belen_bano: slot("belen").bathroom !== null,
    tasks,
  };
}

/**
 * Every week from the Monday after `today` up to the fixed horizon.
 * The current week is never part of the result; an empty array means the horizon has passed.
 */
export function buildSchedules({ today = new Date() }: { today?: Date } = {}): WeekSchedule[] {
  const weeks: WeekSchedule[] = [];
  for (let monday = nextMonday(utcDay(today)), i = 0; monday <= HORIZON_END; monday = plusDays(monday, 7), i++) {
    weeks.push(buildWeek(monday, i));
  }
  return weeks;
}
