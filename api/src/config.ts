// config.ts
import { z } from "zod";

export const PEOPLE = ["joan", "mery", "paco", "belen"] as const;
export type Person = (typeof PEOPLE)[number];

export const AREAS = ["cocina", "salon_pasillo", "bano_joan_mery", "bano_paco_belen"] as const;
export type Area = (typeof AREAS)[number];

export const TASK_TYPES = ["limpieza_principal", "limpieza_bano"] as const;
export type TaskType = (typeof TASK_TYPES)[number];

// Rotated between the two pairs; index 0 goes to pair 0 on even weeks
export const MAIN_AREAS = ["cocina", "salon_pasillo"] as const satisfies readonly Area[];
export type MainArea = (typeof MAIN_AREAS)[number];

// Each pair cleans the same main area and shares one bathroom.
// members[0] takes the bathroom on even weeks, members[1] on odd weeks.
export type Pair = { members: readonly [Person, Person]; bathroom: Area };

export const PAIRS: readonly Pair[] = [
  { members: ["joan", "mery"], bathroom: "bano_joan_mery" },
  { members: ["paco", "belen"], bathroom: "bano_paco_belen" },
];

// Last Monday that may still get a schedule
export const HORIZON_END = "2026-07-01";

export const PERSON_LABELS: Record<Person, string> = {
  joan: "Joan",
  mery: "Mery",
  paco: "Paco",
  belen: "Belén",
};

export const AREA_LABELS: Record<Area, string> = {
  cocina: "Cocina",
  salon_pasillo: "Salón y pasillo",
  bano_joan_mery: "Baño Joan y Mery",
  bano_paco_belen: "Baño Paco y Belén",
};

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8001),
  MONGO_URL: z.string().min(1).default("mongodb://localhost:27017"),
  DB_NAME: z.string().min(1).default("casa_limpia"),
  STORE: z.enum(["mongo", "memory"]).default("mongo"),
  CORS_ORIGINS: z.string().default("*"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  ICS_START_TIME: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Time must be HH:mm format").default("18:00"),
});

export type Settings = {
  port: number;
  mongoUrl: string;
  dbName: string;
  store: "mongo" | "memory";
  corsOrigins: string[];
  logLevel: LogLevel;
  icsStartTime: string;
};

export function loadSettings(env: NodeJS.ProcessEnv): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${problems}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    mongoUrl: e.MONGO_URL,
    dbName: e.DB_NAME,
    store: e.STORE,
    corsOrigins: e.CORS_ORIGINS.split(",").map(o => o.trim()).filter(o => o.length > 0),
    logLevel: e.LOG_LEVEL,
    icsStartTime: e.ICS_START_TIME,
  };
}

export const settings = loadSettings(process.env);
