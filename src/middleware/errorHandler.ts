import { Request, Response, NextFunction, RequestHandler } from "express";
import { config } from "../config";
import { logger } from "../utils/logger";
import "../types/express";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class CustomError extends Error implements AppError {
  statusCode: number;
  code: string;
  isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code?: string,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code || "INTERNAL_SERVER_ERROR";
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Common error types
export class ValidationError extends CustomError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

export class AuthenticationError extends CustomError {
  constructor(message: string = "Authentication required") {
    super(message, 401, "AUTHENTICATION_ERROR");
  }
}

export class AuthorizationError extends CustomError {
  constructor(message: string = "Insufficient permissions") {
    super(message, 403, "AUTHORIZATION_ERROR");
  }
}

export class NotFoundError extends CustomError {
  constructor(resource: string = "Resource") {
    super(`${resource} not found`, 404, "NOT_FOUND");
  }
}

export class ConflictError extends CustomError {
  constructor(message: string) {
    super(message, 409, "CONFLICT_ERROR");
  }
}

export class DatabaseError extends CustomError {
  constructor(message: string = "Database operation failed") {
    super(message, 500, "DATABASE_ERROR");
  }
}

// Programming faults: a role reached code that has no branch for it
export class UnsupportedRoleError extends CustomError {
  constructor(roleName: string) {
    super(`Unknown role: ${roleName}`, 500, "UNSUPPORTED_ROLE", false);
  }
}

// Role reference data is corrupt (cycle, dangling parent, unknown name)
export class RoleGraphIntegrityError extends CustomError {
  constructor(message: string) {
    super(message, 500, "ROLE_GRAPH_INTEGRITY", false);
  }
}

// Error response interface
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  timestamp: string;
  path: string;
  requestId?: string;
}

// Centralized error handling middleware
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  // Express recognizes error middleware by its arity
  _next: NextFunction
): void => {
  const requestId =
    req.get("x-request-id") || Math.random().toString(36).substring(2, 15);

  const statusCode = err.statusCode || 500;
  const code = err.code || "INTERNAL_SERVER_ERROR";
  let message = err.message || "An unexpected error occurred";
  let details: Record<string, unknown> | undefined;

  const logData = {
    requestId,
    method: req.method,
    url: req.originalUrl,
    statusCode,
    code,
    message,
    stack: err.stack,
    userId: req.user?.id,
    timestamp: new Date().toISOString(),
  };

  if (statusCode >= 500) {
    logger.error("Server Error", logData);
  } else {
    logger.warn("Client Error", logData);
  }

  // Don't expose internal error details in production
  if (config.nodeEnv === "production") {
    if (statusCode >= 500) {
      message = "Internal server error";
    }
  } else {
    details = { stack: err.stack };
  }

  const errorResponse: ErrorResponse = {
    error: {
      code,
      message,
      ...(details && { details }),
    },
    timestamp: new Date().toISOString(),
    path: req.originalUrl,
    requestId,
  };

  res.status(statusCode).json(errorResponse);
};

type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => Promise<void> | void;

// Async error wrapper
export const asyncHandler = (fn: AsyncRequestHandler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
