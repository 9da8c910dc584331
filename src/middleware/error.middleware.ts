import { Request, Response, NextFunction } from "express";
import { config } from "../config/config";
import { AppError, ErrorDetail, ValidationError } from "../utils/errors";
import logger, { loggerUtils } from "../utils/logger";

interface ErrorResponseBody {
  error: string;
  path: string;
  details?: ErrorDetail[];
  stack?: string;
}

export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  const statusCode = err instanceof AppError ? err.statusCode : 500;
  const message = err.message || "Internal Server Error";

  if (statusCode >= 500) {
    loggerUtils.logError(logger, err, {
      path: req.path,
      method: req.method,
      requestId: res.locals.requestId,
      statusCode,
    });
  } else {
    logger.warn("Request rejected", {
      error: message,
      path: req.path,
      method: req.method,
      requestId: res.locals.requestId,
      statusCode,
    });
  }

  const response: ErrorResponseBody = {
    error: message,
    path: req.path,
  };

  if (err instanceof ValidationError) {
    response.details = err.details;
  }

  if (config.NODE_ENV === "development") {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: "Route not found",
    path: req.path,
  });
};

// Async error wrapper
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
