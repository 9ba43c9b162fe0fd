// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema decode helpers shared by the TOML config loader and the
 * sidecar metadata store.
 */

import { Effect, Either, ParseResult, Schema } from "effect";
import { ConfigError, ErrorCode } from "./errors";

/**
 * Renders a parse error as an indented tree:
 *   Configuration validation failed for /path/to/file.toml:
 *   └─ ["logging"]["level"]
 *      └─ Expected "debug" | "info" | "warn" | "error", actual "loud"
 */
export const formatParseError = (error: ParseResult.ParseError): string =>
  ParseResult.TreeFormatter.formatErrorSync(error);

/**
 * Decode unknown data synchronously, throwing on error.
 * Use only when input is known valid (e.g., empty object with defaults).
 */
export const decodeUnsafe = <A, I>(schema: Schema.Schema<A, I, never>, data: unknown): A =>
  Schema.decodeUnknownSync(schema)(data);

/**
 * Decode unknown data with a schema, mapping the parse error through
 * `onError` so each caller keeps its own error domain.
 */
export const decodeWith = <A, I, E>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  onError: (formatted: string) => E
): Effect.Effect<A, E> =>
  Either.match(Schema.decodeUnknownEither(schema)(data), {
    onLeft: (error): Effect.Effect<A, E> => Effect.fail(onError(formatParseError(error))),
    onRight: (value): Effect.Effect<A, E> => Effect.succeed(value),
  });

export const decodeToEffect = <A, I>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  context: string
): Effect.Effect<A, ConfigError> =>
  decodeWith(
    schema,
    data,
    (formatted) =>
      new ConfigError({
        code: ErrorCode.CONFIG_VALIDATION_ERROR,
        message: `Configuration validation failed for ${context}:\n${formatted}`,
        path: context,
      })
  );
