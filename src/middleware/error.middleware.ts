import { Request, Response, NextFunction } from "express";
import logger from "../utils/logger";
import {
  CatalogQueryError,
  CatalogUnavailableError,
  OrderNotFoundError,
  SubmissionRejectedError,
  ValidationError,
} from "../utils/errors";

export interface HttpError {
  status: number;
  body: { error: string; details?: string };
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: "Invalid request", details: error.message } };
  }
  if (error instanceof OrderNotFoundError) {
    return { status: 404, body: { error: error.message } };
  }
  if (error instanceof CatalogQueryError || error instanceof SubmissionRejectedError) {
    return { status: 502, body: { error: "Upstream request rejected", details: error.message } };
  }
  if (error instanceof CatalogUnavailableError) {
    return { status: 503, body: { error: "Catalog unavailable", details: error.message } };
  }
  return { status: 500, body: { error: "Internal server error" } };
}

/** Logs a controller failure and writes the mapped response. */
export function sendError(res: Response, error: unknown, context: string): void {
  const { status, body } = toHttpError(error);
  if (status >= 500) {
    logger.error(`Error in ${context} controller:`, error);
  } else {
    logger.warn(`${context} rejected: ${body.details ?? body.error}`);
  }
  res.status(status).json(body);
}

/** Terminal handler for errors raised outside the controllers (e.g. body parsing). */
export function errorMiddleware(
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(error);
    return;
  }
  if (error instanceof SyntaxError) {
    res.status(400).json({ error: "Invalid request body", details: error.message });
    return;
  }
  sendError(res, error, `${req.method} ${req.path}`);
}
