// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Parsing of `compose ps --format json`. Older compose releases print one
 * JSON object per line; newer ones print a single JSON array.
 */

import { Array as Arr, Either, Schema, pipe } from "effect";
import { formatParseError } from "../lib/schema-utils";

export type StackState = "running" | "stopped";

export interface StackStatus {
  readonly state: StackState;
  readonly totalContainers: number;
  readonly runningContainers: number;
}

export const STOPPED: StackStatus = { state: "stopped", totalContainers: 0, runningContainers: 0 };

/** Only the fields stackctl reads; the rest of each object is ignored. */
export const ContainerSchema = Schema.Struct({
  Name: Schema.optionalWith(Schema.String, { exact: true }),
  Service: Schema.optionalWith(Schema.String, { exact: true }),
  State: Schema.optionalWith(Schema.String, { exact: true }),
});

export type ContainerInfo = typeof ContainerSchema.Type;

const ContainerArrayJson = Schema.parseJson(Schema.Array(ContainerSchema));
const ContainerJson = Schema.parseJson(ContainerSchema);

const decodeEither = <A, I>(
  schema: Schema.Schema<A, I, never>,
  text: string
): Either.Either<A, string> =>
  Either.mapLeft(Schema.decodeUnknownEither(schema)(text), formatParseError);

export const parseContainers = (output: string): Either.Either<readonly ContainerInfo[], string> => {
  const trimmed = output.trim();
  if (trimmed === "") {
    return Either.right([]);
  }
  if (trimmed.startsWith("[")) {
    return decodeEither(ContainerArrayJson, trimmed);
  }
  const lines = trimmed
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return Either.all(Arr.map(lines, (line) => decodeEither(ContainerJson, line)));
};

export const summarize = (containers: readonly ContainerInfo[]): StackStatus => {
  const running = Arr.filter(containers, (c) => c.State === "running").length;
  return {
    state: running > 0 ? "running" : "stopped",
    totalContainers: containers.length,
    runningContainers: running,
  };
};

export const parseComposePs = (output: string): Either.Either<StackStatus, string> =>
  pipe(parseContainers(output), Either.map(summarize));
