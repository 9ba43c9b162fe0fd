// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for stackctl.
 * Typed error codes map to process exit codes; each failure domain has its
 * own tagged error so handlers can match on `_tag` exhaustively.
 */

import { Data, Predicate } from "effect";

interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;

  // System (20-29)
  readonly EXEC_FAILED: 20;
  readonly FILE_READ_FAILED: 21;
  readonly FILE_WRITE_FAILED: 22;
  readonly DIRECTORY_READ_FAILED: 23;

  // Stack registry (30-39)
  readonly STACK_NOT_FOUND: 30;
  readonly CYCLIC_DEPENDENCY: 31;
  readonly METADATA_PARSE_ERROR: 32;
  readonly METADATA_VALIDATION_ERROR: 33;
  readonly METADATA_WRITE_FAILED: 34;
}

/**
 * Error codes for all stackctl operations, grouped by area.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,

  EXEC_FAILED: 20,
  FILE_READ_FAILED: 21,
  FILE_WRITE_FAILED: 22,
  DIRECTORY_READ_FAILED: 23,

  STACK_NOT_FOUND: 30,
  CYCLIC_DEPENDENCY: 31,
  METADATA_PARSE_ERROR: 32,
  METADATA_VALIDATION_ERROR: 33,
  METADATA_WRITE_FAILED: 34,
};

type GeneralErrorCode = ErrorCodeMap["GENERAL_ERROR"] | ErrorCodeMap["INVALID_ARGS"];

type ConfigErrorCode =
  | ErrorCodeMap["CONFIG_NOT_FOUND"]
  | ErrorCodeMap["CONFIG_PARSE_ERROR"]
  | ErrorCodeMap["CONFIG_VALIDATION_ERROR"];

type SystemErrorCode =
  | ErrorCodeMap["EXEC_FAILED"]
  | ErrorCodeMap["FILE_READ_FAILED"]
  | ErrorCodeMap["FILE_WRITE_FAILED"]
  | ErrorCodeMap["DIRECTORY_READ_FAILED"];

type MetadataErrorCode =
  | ErrorCodeMap["METADATA_PARSE_ERROR"]
  | ErrorCodeMap["METADATA_VALIDATION_ERROR"]
  | ErrorCodeMap["METADATA_WRITE_FAILED"];

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** Sidecar metadata could not be parsed, decoded or written. */
export class MetadataError extends Data.TaggedError("MetadataError")<{
  readonly code: MetadataErrorCode;
  readonly message: string;
  readonly path: string;
  readonly cause?: Error;
}> {}

export class StackNotFoundError extends Data.TaggedError("StackNotFoundError")<{
  readonly code: ErrorCodeMap["STACK_NOT_FOUND"];
  readonly message: string;
  readonly stackName: string;
}> {}

/** `cycle` lists the stack names along the loop, first name repeated at the end. */
export class CyclicDependencyError extends Data.TaggedError("CyclicDependencyError")<{
  readonly code: ErrorCodeMap["CYCLIC_DEPENDENCY"];
  readonly message: string;
  readonly cycle: readonly string[];
}> {}

export type AppError =
  | GeneralError
  | ConfigError
  | SystemError
  | MetadataError
  | StackNotFoundError
  | CyclicDependencyError;

export const stackNotFound = (name: string): StackNotFoundError =>
  new StackNotFoundError({
    code: ErrorCode.STACK_NOT_FOUND,
    message: `Stack '${name}' not found`,
    stackName: name,
  });

export const cyclicDependency = (cycle: readonly string[]): CyclicDependencyError =>
  new CyclicDependencyError({
    code: ErrorCode.CYCLIC_DEPENDENCY,
    message: `Circular dependency detected: ${cycle.join(" -> ")}`,
    cycle,
  });

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: number): number => Math.min(code, 125);

/**
 * Extract error message from unknown value. Platform errors are plain
 * tagged objects rather than Error instances but still carry `message`.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (Predicate.isString(e)) {
    return e;
  }
  if (Predicate.hasProperty(e, "message") && Predicate.isString(e.message)) {
    return e.message;
  }
  return String(e);
};

/** Spread helper: `{ ...causeOf(e) }` attaches `cause` for Error values and message-bearing objects. */
export const causeOf = (e: unknown): { readonly cause?: Error } => {
  if (e instanceof Error) {
    return { cause: e };
  }
  return Predicate.hasProperty(e, "message") && Predicate.isString(e.message)
    ? { cause: new Error(e.message, { cause: e }) }
    : {};
};
