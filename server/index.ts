import 'dotenv/config';
import express, { type Request, type Response, type NextFunction } from "express";
import { loadConfig } from "./config";
import { closeDb } from "./db";
import { log, logError, errorMessage } from "./log";
import { registerRoutes } from "./routes";
import { storage } from "./storage";
import { createPipelineDeps, runPipeline } from "./services/pipeline";
import { PipelineScheduler } from "./services/pipeline-scheduler";

const config = loadConfig();

const app = express();
app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
    }
  });

  next();
});

const scheduler = new PipelineScheduler(
  () => runPipeline(createPipelineDeps(config, storage)),
  config.schedule,
);

const server = registerRoutes(app, { store: storage, scheduler });

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  logError("Unhandled request error", "express", err);
  res.status(500).json({ message: errorMessage(err) || "Internal Server Error" });
});

server.listen({ port: config.port, host: "0.0.0.0" }, () => {
  log(`serving on port ${config.port}`);
  scheduler.start();
});

const shutdown = (signal: string) => {
  log(`${signal} received, shutting down`);
  scheduler.stop();
  server.close();
  closeDb()
    .then(() => process.exit(0))
    .catch(error => {
      logError("Database pool did not close cleanly", "express", error);
      process.exit(1);
    });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
