import { errorMessage } from "./utils/async.js";

export type ValidationErrorCode =
  | "MissingArgument"
  | "NoScheduleOption"
  | "ConflictingScheduleOptions"
  | "InvalidTimeFormat"
  | "TimeNotInFuture"
  | "InvalidCronExpression"
  | "InvalidIntervalFormat"
  | "StartTimeNotInFuture"
  | "InvalidMaxRepetitions"
  | "AgentValidationFailed";

/** Raised when a stored row cannot be turned back into a schedule. */
export type CalculatorErrorCode = "InvalidScheduleValue" | "UnknownScheduleType";

export type ScheduleErrorCode = ValidationErrorCode | CalculatorErrorCode;

export class ScheduleError extends Error {
  readonly code: ScheduleErrorCode;

  constructor(code: ScheduleErrorCode, message: string) {
    super(message);
    this.name = "ScheduleError";
    this.code = code;
  }
}

export class StorageError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Storage ${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = "StorageError";
    this.operation = operation;
  }
}

export function isScheduleError(e: unknown, code?: ScheduleErrorCode): e is ScheduleError {
  return e instanceof ScheduleError && (code === undefined || e.code === code);
}
