import type { ErrorHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import type { ApiError } from "@lexstream/shared";
import { AppError } from "../lib/errors.js";
import { log } from "./logger.js";
import type { AppEnv } from "../app.js";

function statusOf(err: AppError): ContentfulStatusCode {
  switch (err.statusCode) {
    case 404:
      return 404;
    case 409:
      return 409;
    case 422:
      return 422;
    case 429:
      return 429;
    case 502:
      return 502;
    default:
      return 400;
  }
}

export const errorHandler: ErrorHandler<AppEnv> = (err, c) => {
  const requestId = c.get("requestId");

  if (err instanceof AppError) {
    const body: ApiError = { error: err.message, code: err.code, requestId };
    return c.json(body, statusOf(err));
  }

  if (err instanceof ZodError) {
    const body: ApiError = {
      error: "Validation failed",
      code: "VALIDATION_ERROR",
      detail: err.flatten().fieldErrors,
      requestId,
    };
    return c.json(body, 422);
  }

  log.error({ requestId, err: err.message, stack: err.stack }, "Unhandled error");
  const body: ApiError = { error: "Internal server error", code: "INTERNAL_ERROR", requestId };
  return c.json(body, 500);
};
