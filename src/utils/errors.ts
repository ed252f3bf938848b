/**
 * Error taxonomy for the acquisition pipeline.
 *
 * Transient transport failures are retried by the retry policy and surface
 * as CatalogUnavailableError / TransferFailedError once attempts run out.
 * Request errors (4xx, malformed payloads) surface immediately.
 */

export class CatalogUnavailableError extends Error {
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, cause: Error) {
    super(
      `Catalog unavailable after ${attempts} attempts: ${url}: ${cause.message}`,
    );
    this.name = "CatalogUnavailableError";
    this.url = url;
    this.attempts = attempts;
    this.cause = cause;
  }
}

export class CatalogQueryError extends Error {
  readonly url: string;
  readonly statusCode?: number;
  readonly body?: unknown;

  constructor(message: string, url: string, statusCode?: number, body?: unknown) {
    super(message);
    this.name = "CatalogQueryError";
    this.url = url;
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class SubmissionRejectedError extends Error {
  readonly statusCode?: number;
  readonly body?: unknown;

  constructor(message: string, statusCode?: number, body?: unknown) {
    super(message);
    this.name = "SubmissionRejectedError";
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class TransferFailedError extends Error {
  readonly source: string;
  readonly destination: string;

  constructor(source: string, destination: string, cause: Error) {
    super(`Transfer failed for ${destination}: ${cause.message}`);
    this.name = "TransferFailedError";
    this.source = source;
    this.destination = destination;
    this.cause = cause;
  }
}

export class BulkTransferUnavailableError extends Error {
  constructor(reason: string) {
    super(`Bulk transfer unavailable: ${reason}`);
    this.name = "BulkTransferUnavailableError";
  }
}

export class ValidationError extends Error {
  readonly item?: string;

  constructor(message: string, item?: string) {
    super(item ? `${item}: ${message}` : message);
    this.name = "ValidationError";
    this.item = item;
  }
}

export class OrderNotFoundError extends Error {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Order not found: ${jobId}`);
    this.name = "OrderNotFoundError";
    this.jobId = jobId;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
