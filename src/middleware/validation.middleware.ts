import { Request, Response, NextFunction, RequestHandler } from "express";
import { ZodError, ZodSchema } from "zod";
import { ErrorDetail } from "../utils/errors";

/**
 * Schemas for the parts of a request a route accepts. The parsed query is
 * stored on res.locals.query, the parsed body replaces req.body.
 */
export interface RequestSchemas {
  query?: ZodSchema;
  body?: ZodSchema;
}

const toDetails = (error: ZodError): ErrorDetail[] =>
  error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));

const rejectWith =
  (res: Response) =>
  (error: string, zodError: ZodError): void => {
    res.status(400).json({ error, details: toDetails(zodError) });
  };

/**
 * Validates the query string first, then the body; the first failing part
 * answers 400 and the handler never runs.
 */
export const validateRequest = (schemas: RequestSchemas): RequestHandler => {
  return async (
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> => {
    const reject = rejectWith(res);

    try {
      if (schemas.query) {
        const query = await schemas.query.safeParseAsync(req.query);
        if (!query.success) {
          reject("Query validation failed", query.error);
          return;
        }
        res.locals.query = query.data;
      }

      if (schemas.body) {
        const body = await schemas.body.safeParseAsync(req.body);
        if (!body.success) {
          reject("Validation failed", body.error);
          return;
        }
        req.body = body.data;
      }
    } catch (error) {
      next(error);
      return;
    }

    next();
  };
};
