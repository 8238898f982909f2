import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import { AppError, NotFoundError, ValidationError, asFailure, errorMessage } from "./errors.js";
import { buildPersonCalendar } from "./ics.js";
import { logger } from "./logger.js";
import { renderPlanPdf } from "./pdf.js";
import type { ScheduleService } from "./service.js";
import { parsePerson, parseTaskCompletion } from "./validation.js";

export type AppOptions = {
  service: ScheduleService;
  corsOrigins?: string[];
  icsStartTime?: string;
};

export const WELCOME = "Casa Limpia API - ¡Tu planificador de limpieza doméstica con baños incluidos!";

// Express 4 does not catch rejected handlers; route them to the error middleware
// with the operation name attached to unexpected failures.
const handle =
  (context: string, fn: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res).catch((err: unknown) => next(asFailure(context, err)));
  };

const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";

export function createApp({ service, corsOrigins = ["*"], icsStartTime = "18:00" }: AppOptions) {
  const app = express();
  app.use(cors({ origin: corsOrigins.includes("*") ? true : corsOrigins, credentials: true }));
  app.use(express.json());

  const api = express.Router();

  api.get("/", (_req, res) => {
    res.json({ message: WELCOME });
  });

  api.post("/generate-schedules", handle("Error creando planificaciones", async (_req, res) => {
    const { created, from, to } = await service.generate();
    res.json({
      message: `Se crearon ${created} planificaciones semanales con baños incluidos`,
      created,
      from,
      to,
    });
  }));

  api.get("/current-week", handle("Error obteniendo semana actual", async (_req, res) => {
    res.json(await service.currentWeek());
  }));

  api.post("/complete-task", handle("Error actualizando tarea", async (req, res) => {
    const update = parseTaskCompletion(req.body);
    await service.completeTask(update);
    res.json({ message: "Tarea actualizada correctamente", completed: update.completed });
  }));

  api.get("/schedules", handle("Error obteniendo planificaciones", async (_req, res) => {
    res.json(await service.listAll());
  }));

  api.delete("/schedules", handle("Error eliminando planificaciones", async (_req, res) => {
    const deleted = await service.deleteAll();
    res.json({ message: `Se eliminaron ${deleted} planificaciones`, deleted });
  }));

  api.get("/schedules.pdf", handle("Error generando PDF", async (_req, res) => {
    const weeks = await service.listAll();
    if (weeks.length === 0) throw new NotFoundError("No hay planificaciones disponibles");
    res.setHeader("Content-Type", "application/pdf");
    res.setHeader("Content-Disposition", `inline; filename="plan-limpieza.pdf"`);
    renderPlanPdf(weeks, res);
  }));

  api.get("/ics/:person", handle("Error generando calendario", async (req, res) => {
    const person = parsePerson(req.params.person);
    const entries = await service.tasksOf(person);
    if (entries.length === 0) throw new NotFoundError("No hay planificaciones disponibles");
    const calendar = buildPersonCalendar(person, entries, icsStartTime);
    res.setHeader("Content-Type", "text/calendar; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="${person}-limpieza.ics"`);
    res.send(calendar);
  }));

  app.use("/api", api);

  app.use((req, _res, next) => {
    next(new NotFoundError(`Ruta no encontrada: ${req.method} ${req.path}`));
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error =
      err instanceof AppError ? err
      : isBodyParseError(err) ? new ValidationError(`Invalid JSON body: ${errorMessage(err)}`)
      : asFailure("Error interno", err);
    if (error.status >= 500) logger.error(`${req.method} ${req.originalUrl} -> ${error.status}`, error.message);
    else logger.debug(`${req.method} ${req.originalUrl} -> ${error.status}`, error.message);
    res.status(error.status).json(error.toBody());
  });

  return app;
}
