// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Process exit codes from a finished CLI run.
 */

import { ValidationError } from "@effect/cli";
import { Cause, Exit, Match, Option, pipe } from "effect";
import { ErrorCode, toExitCode } from "../lib/errors";

export const INTERRUPTED_EXIT_CODE = 130;

const hasErrorCode = (v: unknown): v is { readonly code: number } =>
  typeof v === "object" && v !== null && "code" in v && typeof v.code === "number";

export const exitCodeFromExit = <A, E>(exit: Exit.Exit<A, E>): number =>
  Exit.match(exit, {
    onSuccess: (): number => ErrorCode.SUCCESS,
    onFailure: (cause): number =>
      Cause.isInterruptedOnly(cause)
        ? INTERRUPTED_EXIT_CODE
        : Option.match(Cause.failureOption(cause), {
            onNone: (): number => ErrorCode.GENERAL_ERROR,
            onSome: (value: unknown): number =>
              pipe(
                Match.value(value),
                Match.when(ValidationError.isValidationError, (): number => ErrorCode.INVALID_ARGS),
                Match.when(hasErrorCode, (v): number => toExitCode(v.code)),
                Match.orElse((): number => ErrorCode.GENERAL_ERROR)
              ),
          }),
  });

/** Typed failures are shown by the command itself; defects are not. */
export const defectMessage = <A, E>(exit: Exit.Exit<A, E>): Option.Option<string> =>
  Exit.match(exit, {
    onSuccess: () => Option.none(),
    onFailure: (cause) =>
      Option.isNone(Cause.failureOption(cause)) && !Cause.isInterruptedOnly(cause)
        ? Option.some(`Unexpected error: ${Cause.pretty(cause)}`)
        : Option.none(),
  });
