import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "node:http";
import multer from "multer";
import type { ServerConfig } from "./config";
import { loadSourcesFromZip, parseSourceCsv } from "./dataset-loader";
import { buildRoleDashboard, isRole, ROLE_THEME, ROLES } from "./role-views";
import {
  buildSessionContext,
  describeSources,
  replaceSource,
  runPipeline,
  type SessionContext,
  type SessionStore,
} from "./session";
import { isSourceName, sourceForFile } from "./sources";
import type { LoadResults } from "./types/telemetry";
import { isValidDateString } from "./validation";

export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES } });

export interface RouteDeps {
  store: SessionStore;
  config: ServerConfig;
}

function sourcesSummary(context: SessionContext) {
  return {
    loadedFrom: context.loadedFrom,
    loadedAt: context.loadedAt,
    bounds: context.bounds,
    sources: describeSources(context),
  };
}

type DateParam = { ok: true; value: string | null } | { ok: false; error: string };

function readDateParam(name: string, raw: unknown): DateParam {
  if (raw === undefined || raw === "") return { ok: true, value: null };
  if (typeof raw !== "string" || !isValidDateString(raw)) {
    return { ok: false, error: `${name}: invalid date string "${String(raw)}"` };
  }
  return { ok: true, value: raw };
}

export function registerRoutes(app: Express, deps: RouteDeps): Server {
  const { store, config } = deps;

  function requireAuth(req: Request, res: Response, next: NextFunction) {
    if (!config.apiKey) return next();
    const authHeader = req.headers.authorization || "";
    const token = authHeader.startsWith("Bearer ") ? authHeader.slice(7) : "";
    if (token !== config.apiKey) {
      return res.status(401).json({ error: "Unauthorized" });
    }
    next();
  }

  app.use("/api", requireAuth);

  app.get("/api/sources", (_req: Request, res: Response) => {
    res.json(sourcesSummary(store.current()));
  });

  app.get("/api/range", (_req: Request, res: Response) => {
    res.json({ bounds: store.current().bounds });
  });

  app.get("/api/roles", (_req: Request, res: Response) => {
    res.json(ROLES.map((role) => ({ role, color: ROLE_THEME[role] })));
  });

  app.get("/api/dashboard", (req: Request, res: Response) => {
    try {
      const role = typeof req.query.role === "string" ? req.query.role : ROLES[0];
      if (!isRole(role)) {
        return res.status(400).json({ error: "invalid_role", message: `Unknown role "${role}"` });
      }

      const start = readDateParam("start", req.query.start);
      if (!start.ok) return res.status(400).json({ error: "invalid_date", message: start.error });
      const end = readDateParam("end", req.query.end);
      if (!end.ok) return res.status(400).json({ error: "invalid_date", message: end.error });

      const result = runPipeline(store.current(), { start: start.value, end: end.value });
      if (result.status === "halted") {
        const { kind, message, bounds } = result.halt;
        return res.status(422).json({ error: kind, message, bounds });
      }

      res.json(buildRoleDashboard(role, result));
    } catch (err: unknown) {
      console.error("dashboard error:", err);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  app.post("/api/import/export", upload.single("file"), async (req: Request, res: Response) => {
    try {
      if (!req.file) {
        return res.status(400).json({ error: "No file uploaded" });
      }
      const { originalname, buffer } = req.file;
      const lowerName = originalname.toLowerCase();
      const origin = `upload:${originalname}`;
      const options = { timezone: config.timezone };
      let next: SessionContext;

      if (lowerName.endsWith(".zip")) {
        let results: LoadResults;
        try {
          results = await loadSourcesFromZip(buffer, options);
        } catch (err: unknown) {
          console.warn(`[import] could not read archive ${originalname}:`, err);
          return res.status(400).json({ error: "Could not read archive" });
        }
        next = buildSessionContext(results, origin);
      } else if (lowerName.endsWith(".csv")) {
        const field: unknown = req.body?.source;
        const source = typeof field === "string" && field !== "" ? field : sourceForFile(originalname);
        if (!source || !isSourceName(source)) {
          return res.status(400).json({ error: `Unknown source for ${originalname}` });
        }
        const result = parseSourceCsv(source, buffer.toString("utf-8"), options);
        if (!result.ok) {
          return res.status(400).json({ error: result.error.kind, message: result.error.message });
        }
        console.log(`[import] ${source}: ${result.dataset.records.length} rows from ${originalname}`);
        next = replaceSource(store.current(), source, result, origin);
      } else {
        return res.status(400).json({ error: "Expected a .zip export or a .csv file" });
      }

      store.replace(next);
      console.log(`[import] session rebuilt from ${origin}, bounds ${next.bounds ? `${next.bounds.min}..${next.bounds.max}` : "none"}`);
      res.json(sourcesSummary(next));
    } catch (err: unknown) {
      console.error("import error:", err);
      res.status(500).json({ error: "Import failed" });
    }
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof multer.MulterError) {
      return res.status(400).json({ error: err.message });
    }
    console.error("unhandled route error:", err);
    res.status(500).json({ error: "Internal server error" });
  });

  return createServer(app);
}
