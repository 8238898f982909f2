import { addDays, format, getISOWeek, getISODay, getYear, isValid, parseISO, startOfISOWeek } from "date-fns";

// Calendar days travel as "YYYY-MM-DD" strings, which also sort chronologically
const DAY = "yyyy-MM-dd";
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const isDay = (value: string): boolean => DAY_PATTERN.test(value) && isValid(parseISO(value));

const toDay = (date: Date) => format(date, DAY);

// The household runs on UTC dates, whatever the server's zone
export const utcDay = (now: Date): string => now.toISOString().slice(0, 10);

export const utcTimestamp = (now: Date): string => now.toISOString().replace(/Z$/, "+00:00");

export const plusDays = (day: string, n: number): string => toDay(addDays(parseISO(day), n));

export const mondayOf = (day: string): string => toDay(startOfISOWeek(parseISO(day)));

/** Monday of the following week. A Monday maps to the Monday seven days later, never to itself. */
export const nextMonday = (day: string): string => {
  const weekday = getISODay(parseISO(day)) - 1; // Monday = 0
  return plusDays(day, (7 - weekday) % 7 || 7);
};

export const isoWeekNumber = (day: string): number => getISOWeek(parseISO(day));

export const calendarYear = (day: string): number => getYear(parseISO(day));

export const dayParts = (day: string): [number, number, number] => {
  const d = parseISO(day);
  return [d.getFullYear(), d.getMonth() + 1, d.getDate()];
};
