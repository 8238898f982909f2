import { z } from "zod";
import { AREAS, PEOPLE, TASK_TYPES, type Person } from "./config.js";
import { isDay } from "./dates.js";
import { ValidationError } from "./errors.js";
import type { TaskCompletionUpdate } from "./service.js";

export const PersonSchema = z.enum(PEOPLE);

export const TaskCompletionSchema = z.object({
  week_start: z.string().refine(isDay, "Date must be a valid YYYY-MM-DD date"),
  person: PersonSchema,
  area: z.enum(AREAS),
  task_type: z.enum(TASK_TYPES),
  completed: z.boolean(),
});

function parse<T>(schema: z.ZodType<T>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (result.success) return result.data;
  const issues = result.error.issues.map(i => ({ path: i.path.join("."), message: i.message }));
  throw new ValidationError(`Invalid ${what}`, issues);
}

export const parseTaskCompletion = (body: unknown): TaskCompletionUpdate =>
  parse(TaskCompletionSchema, body, "task update");

export const parsePerson = (value: unknown): Person => parse(PersonSchema, value, "person");
