// src/config/config.ts
import dotenv from "dotenv";

dotenv.config();

const toNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) ? parsed : fallback;
};

const config = Object.freeze({
  port: toNumber(process.env.PORT, 8000),
  databaseURI: process.env.MONGODB_URI || "mongodb://localhost:27017/training_centers",
  appName: process.env.APP_NAME || "Traini8 Backend",
  corsOrigin: process.env.CORS_ORIGIN || "*",
  jsonLimit: process.env.JSON_LIMIT || "100kb",
  rateLimitWindowMs: toNumber(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000), // 15 minutes
  rateLimitMax: toNumber(process.env.RATE_LIMIT_MAX, 1000),
});

export type AppConfig = typeof config;

export default config;
