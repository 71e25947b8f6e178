import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import healthRoutes from "./routes/health.route";
import { createTrainsRouter, TrainSearcher } from "./routes/trains.route";

export const API_VERSION = "1.0.0";

export interface AppDependencies {
  searchService: TrainSearcher;
  corsOrigins?: string[];
}

export function createApp({ searchService, corsOrigins = [] }: AppDependencies) {
  const app = express();

  app.use(corsOrigins.length > 0 ? cors({ origin: corsOrigins, methods: ["GET", "POST"] }) : cors());
  app.use(express.json());

  app.get("/", (req, res) => {
    res.json({
      message: "Train Picker API is running",
      version: API_VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  // Route API
  app.use("/api/health", healthRoutes);
  app.use("/api/trains", createTrainsRouter(searchService));

  // Gestione errori
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    console.error("❌ Errore non gestito:", err);
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json({
      success: false,
      error: "Internal server error",
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
