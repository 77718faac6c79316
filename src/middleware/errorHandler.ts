// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export type ValidationKind =
  | "MissingField"
  | "FieldTooLong"
  | "InvalidLength"
  | "InvalidFormat"
  | "IncompleteAddress"
  | "InvalidType";

/** Client-caused payload problem; always a 400. */
export class ValidationError extends ApiError {
  constructor(
    public readonly kind: ValidationKind,
    message: string,
    public readonly field?: string
  ) {
    super(400, message);
  }
}

export class DuplicateKeyError extends ApiError {
  constructor(message: string) {
    super(400, message);
  }
}

/** Any failure while talking to the store. The detail is sent back as-is. */
export class StoreError extends ApiError {
  constructor(public readonly detail: string) {
    super(500, `Database error: ${detail}`);
  }
}

// body-parser and express-rate-limit raise http-errors style objects
const clientErrorStatus = (err: unknown): number | undefined => {
  if (typeof err !== "object" || err === null) return undefined;
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
};

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // express only treats 4-arity functions as error handlers
  next: NextFunction
) {
  if (err instanceof ApiError) {
    if (err.statusCode >= 500) {
      console.error(`[ERROR] ${req.method} ${req.originalUrl}`, err.message);
    }
    res.status(err.statusCode).json({ error: err.message });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined && err instanceof Error) {
    res.status(status).json({ error: err.message });
    return;
  }

  console.error(`[ERROR] ${req.method} ${req.originalUrl}`, err);
  res.status(500).json({ error: "Internal Server Error" });
}
