// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Styled log lines. The LogStyle ADT is encoded as annotations so the
 * logger in effect-logger.ts owns all visual formatting.
 */

import { Data, Effect, Match, pipe } from "effect";

type LogStyle = Data.TaggedEnum<{
  step: { readonly current: number; readonly total: number };
  success: object;
  fail: object;
}>;

const { step, success, fail } = Data.taggedEnum<LogStyle>();

const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("step", ({ current, total }) => ({
      logStyle: "step",
      stepNumber: String(current),
      stepTotal: String(total),
    })),
    Match.tag("success", () => ({ logStyle: "success" })),
    Match.tag("fail", () => ({ logStyle: "fail" })),
    Match.exhaustive
  );

const logStyled = (style: LogStyle, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

export const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  logStyled(step({ current, total }), message);

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

export const logFail = (message: string): Effect.Effect<void> => logStyled(fail(), message);

/** Bypasses the logger for program output (listings, reports, log lines). */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

/** Program output as a single JSON document. */
export const writeJson = (value: unknown): Effect.Effect<void> =>
  writeOutput(JSON.stringify(value, null, 2));
