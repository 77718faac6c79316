import rateLimit from "express-rate-limit";
import sanitize from "mongo-sanitize";
import { Request, Response, NextFunction } from "express";
import config from "../config/config";

export const apiRateLimiter = rateLimit({
  windowMs: config.rateLimitWindowMs,
  max: config.rateLimitMax,
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: "Too many requests from this IP. Please try again later." },
});

/**
 * Strips `$`-prefixed keys from the body and query so they can never reach
 * a mongo filter as operators.
 */
export const sanitizeInput = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  if (req.body) {
    req.body = sanitize(req.body);
  }

  // Query keys are cleaned one by one: req.query itself is only a getter
  if (req.query) {
    Object.keys(req.query).forEach((key) => {
      req.query[key] = sanitize(req.query[key]);
    });
  }

  next();
};
