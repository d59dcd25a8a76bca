import type { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { CircleError, HttpError } from "../utils/errors.js";

export function notFoundHandler(_request: Request, response: Response): void {
  response.status(404).json({
    error: {
      code: "NOT_FOUND",
      message: "Route not found.",
    },
  });
}

export function errorHandler(
  error: unknown,
  _request: Request,
  response: Response,
  _next: NextFunction
): void {
  if (error instanceof ZodError) {
    response.status(400).json({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request payload is invalid.",
        details: error.flatten(),
      },
    });
    return;
  }
  if (error instanceof CircleError) {
    response.status(error.status).json({
      error: {
        code: error.code,
        numericCode: error.numericCode,
        message: error.message,
        details: error.details,
      },
    });
    return;
  }
  if (error instanceof HttpError) {
    response.status(error.status).json({
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
    });
    return;
  }
  response.status(500).json({
    error: {
      code: "INTERNAL_SERVER_ERROR",
      message: error instanceof Error ? error.message : "Unexpected error.",
    },
  });
}
