// src/app.ts
import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import config from "./config/config";
import { errorHandler } from "./middleware/errorHandler";
import { apiRateLimiter, sanitizeInput } from "./middleware/security";
import type { TrainingCenterStore } from "./lib/trainingCenterStore";

// Routes
import trainingCenterRoutes from "./routes/trainingCenters";

export function createApp(store: TrainingCenterStore): Express {
  const app = express();

  // Security & Performance Middleware
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: config.jsonLimit }));
  app.use(apiRateLimiter);
  app.use(sanitizeInput);

  // Health check
  app.get("/", (req, res) => {
    res.status(200).json({ message: `${config.appName} API is running` });
  });

  // API Routes
  app.use(trainingCenterRoutes(store));

  app.use((req, res) => {
    res.status(404).json({
      error: `Route ${req.originalUrl} not found`,
    });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}

export default createApp;
