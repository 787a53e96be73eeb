import type { Express } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import type { IStorage } from "./storage";
import type { PipelineScheduler } from "./services/pipeline-scheduler";

export interface RouteDeps {
  store: IStorage;
  scheduler: Pick<PipelineScheduler, "getStatus" | "trigger">;
}

const recentQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export function registerRoutes(app: Express, { store, scheduler }: RouteDeps): Server {
  app.get("/api/listings/stats", async (_req, res) => {
    try {
      const stats = await store.getStats();
      res.json(stats);
    } catch (error) {
      res.status(500).json({ message: "Failed to fetch stats" });
    }
  });

  app.get("/api/listings/recent", async (req, res) => {
    const query = recentQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ message: "limit must be an integer between 1 and 100" });
    }

    try {
      const listings = await store.getRecentListings(query.data.limit);
      res.json(listings);
    } catch (error) {
      res.status(500).json({ message: "Failed to fetch listings" });
    }
  });

  app.get("/api/pipeline/status", (_req, res) => {
    res.json(scheduler.getStatus());
  });

  app.post("/api/pipeline/run", (_req, res) => {
    if (!scheduler.trigger()) {
      return res.status(409).json({ message: "Pipeline is already running" });
    }
    res.status(202).json({ message: "Pipeline run started" });
  });

  return createServer(app);
}
