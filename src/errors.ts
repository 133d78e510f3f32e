import type { RunStage } from "./types";

export type CycleCountErrorCode =
  | "SourceUnavailable"
  | "SourceMalformedResponse"
  | "InvalidDateData"
  | "StoreUnavailable"
  | "RunAlreadyInProgress"
  | "NotFound"
  | "InvalidStatusTransition"
  | "Internal";

/**
 * Base for every failure the engine reports. `stage` is filled in by the run
 * coordinator once it knows which step of the cycle failed.
 */
export class CycleCountError extends Error {
  readonly code: CycleCountErrorCode;
  readonly statusCode: number;
  readonly details: unknown;
  stage: RunStage | null = null;

  constructor(code: CycleCountErrorCode, message: string, statusCode = 500, details: unknown = null) {
    super(message);
    this.name = code;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Network failure, timeout or non-2xx status from the inventory API. */
export class SourceUnavailable extends CycleCountError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super("SourceUnavailable", message, 502);
    this.status = status;
  }
}

export class SourceMalformedResponse extends CycleCountError {
  constructor(message: string, issues: unknown = null) {
    super("SourceMalformedResponse", message, 502, issues);
  }
}

export class InvalidDateData extends CycleCountError {
  readonly itemId: string;
  readonly field: string;

  constructor(itemId: string, field: string, value: string) {
    super("InvalidDateData", `Item ${itemId} has an unparseable ${field}: "${value}"`, 500, { itemId, field, value });
    this.itemId = itemId;
    this.field = field;
  }
}

export class StoreUnavailable extends CycleCountError {
  constructor(message: string, cause?: unknown) {
    super("StoreUnavailable", message, 500, cause instanceof Error ? cause.message : null);
  }
}

/** Concurrency guard, not a business failure: a run is already between fetch and persist. */
export class RunAlreadyInProgress extends CycleCountError {
  constructor(runId: string | null) {
    super("RunAlreadyInProgress", runId ? `Run ${runId} is already in progress` : "A run is already in progress", 409);
  }
}

export class NotFoundError extends CycleCountError {
  constructor(message: string) {
    super("NotFound", message, 404);
  }
}

export class InvalidStatusTransition extends CycleCountError {
  constructor(orderId: string, from: string, to: string) {
    super("InvalidStatusTransition", `Order ${orderId} cannot move from ${from} to ${to}`, 409);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
