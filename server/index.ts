import express, { type NextFunction, type Request, type Response } from "express";
import * as path from "node:path";
import { loadConfig } from "./config";
import { loadAllSources } from "./dataset-loader";
import { registerRoutes } from "./routes";
import { buildSessionContext, SessionStore } from "./session";

function requestLog(req: Request, res: Response, next: NextFunction) {
  const started = Date.now();
  res.on("finish", () => {
    if (req.path.startsWith("/api")) {
      console.log(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - started}ms`);
    }
  });
  next();
}

function main(): void {
  const config = loadConfig();
  const dataDir = path.resolve(config.dataDir);
  const results = loadAllSources(dataDir, { timezone: config.timezone });
  const session = buildSessionContext(results, dataDir);

  if (!session.bounds) {
    console.warn("[server] no valid data found; dashboards will report no data until an export is uploaded");
  } else {
    console.log(`[server] data available ${session.bounds.min} → ${session.bounds.max}`);
  }

  const app = express();
  app.use(requestLog);

  const server = registerRoutes(app, { store: new SessionStore(session), config });
  server.listen(config.port, () => {
    console.log(`[server] serving on port ${config.port}`);
  });
}

main();
