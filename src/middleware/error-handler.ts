import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { CycleInProgressError, SourceConfigError, StoreIOError } from "../services/errors.js";
import { logger } from "../utils/logger.js";

export class AppError extends Error {
  status: ContentfulStatusCode;

  constructor(message: string, status: ContentfulStatusCode = 500) {
    super(message);
    this.status = status;
  }
}

function toAppError(error: unknown): AppError | null {
  if (error instanceof AppError) return error;
  if (error instanceof CycleInProgressError) return new AppError(error.message, 409);
  if (error instanceof StoreIOError) return new AppError("Seen Item Store Unavailable", 503);
  if (error instanceof SourceConfigError) return new AppError(error.message, 500);
  return null;
}

export function formatErrorResponse(error: unknown, c: Context): Response {
  const requestId = c.res.headers.get("x-request-id") ?? c.req.header("x-request-id");
  const appError = toAppError(error);

  if (appError) {
    logger.warn("request_failed", {
      requestId,
      status: appError.status,
      path: c.req.path,
      message: error instanceof Error ? error.message : appError.message,
    });
    return c.json(
      {
        code: appError.status,
        message: appError.message,
      },
      appError.status,
    );
  }

  const message = error instanceof Error ? error.message : "Internal Server Error";

  logger.error("unhandled_error", {
    requestId,
    path: c.req.path,
    message,
  });

  return c.json(
    {
      code: 500,
      message: "Internal Server Error",
    },
    500,
  );
}
