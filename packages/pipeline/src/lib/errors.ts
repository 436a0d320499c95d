import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import type { EnrichmentErrorKind, TransportErrorKind } from "@digest/shared";
import type { AppEnv } from "../types/env.js";
import { logger } from "./logger.js";

// ============================================================
// HTTP errors
// ============================================================

export type ErrorCode =
  | "BAD_REQUEST"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "CONFLICT"
  | "VALIDATION_ERROR"
  | "INTERNAL_ERROR"
  | "SERVICE_UNAVAILABLE";

export class AppError extends Error {
  code: ErrorCode;
  status: ContentfulStatusCode;
  details?: unknown;

  constructor(opts: { code: ErrorCode; status: ContentfulStatusCode; message: string; details?: unknown }) {
    super(opts.message);
    this.name = "AppError";
    this.code = opts.code;
    this.status = opts.status;
    this.details = opts.details;
  }
}

export function badRequest(message: string, details?: unknown) {
  return new AppError({ code: "BAD_REQUEST", status: 400, message, details });
}

export function unauthorized(message = "Unauthorized") {
  return new AppError({ code: "UNAUTHORIZED", status: 401, message });
}

export function notFound(resource: string, id?: string) {
  return new AppError({
    code: "NOT_FOUND",
    status: 404,
    message: `${resource} not found`,
    details: id ? { resource, id } : { resource },
  });
}

export function conflict(message: string, details?: unknown) {
  return new AppError({ code: "CONFLICT", status: 409, message, details });
}

export function validationError(message = "Validation failed", details?: unknown) {
  return new AppError({ code: "VALIDATION_ERROR", status: 422, message, details });
}

export function internalError(message = "Internal error", details?: unknown) {
  return new AppError({ code: "INTERNAL_ERROR", status: 500, message, details });
}

export function serviceUnavailable(message: string, details?: unknown) {
  return new AppError({ code: "SERVICE_UNAVAILABLE", status: 503, message, details });
}

export function toErrorResponse(c: Context<AppEnv>, err: unknown): Response {
  const requestId: string | undefined = c.get("requestId") ?? c.req.header("x-request-id");

  const render = (e: AppError) =>
    c.json(
      {
        error: {
          code: e.code,
          message: e.message,
          status: e.status,
          details: e.details,
          requestId,
        },
      },
      e.status
    );

  if (err instanceof AppError) return render(err);
  if (err instanceof ZodError) return render(validationError("Validation failed", err.issues));

  logger.error({ err, requestId }, "Unhandled error");
  return render(internalError());
}

// ============================================================
// Pipeline errors
// ============================================================

/** A durable-store failure, tagged with the gateway operation that hit it. */
export class StorageError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`storage: ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "StorageError";
    this.operation = operation;
  }
}

/** Cache-miss sentinel. */
export class NotFoundError extends Error {
  constructor(what: string) {
    super(`${what} not found`);
    this.name = "NotFoundError";
  }
}

export class EnrichmentError extends Error {
  readonly kind: EnrichmentErrorKind;

  constructor(kind: EnrichmentErrorKind, message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "EnrichmentError";
    this.kind = kind;
  }

  /** Transient and rate-limited failures are retried with backoff. */
  get retryable() {
    return this.kind !== "permanent";
  }
}

export class EmbeddingError extends Error {
  constructor(message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "EmbeddingError";
  }
}

export class TransportError extends Error {
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "TransportError";
    this.kind = kind;
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
