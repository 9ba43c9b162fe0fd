// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Path resolution through the platform `Path` service, so every path that
 * enters the registry is absolute and normalized before it is branded.
 */

import { Path } from "@effect/platform";
import { Effect } from "effect";
import { ConfigError, ErrorCode } from "./errors";
import { AbsolutePath } from "./types";

const hasNullByte = (p: string): boolean => p.includes("\0");

/** Resolves `p` against the working directory. */
export const toAbsolutePathEffect = (
  p: string
): Effect.Effect<AbsolutePath, ConfigError, Path.Path> =>
  Effect.gen(function* () {
    if (hasNullByte(p)) {
      return yield* Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid path contains null byte: ${p}`,
        })
      );
    }
    const path = yield* Path.Path;
    return AbsolutePath(path.resolve(p));
  });

/** Expands a leading `~` to the given home directory. */
export const expandHome = (p: string, home: string): string =>
  p === "~" ? home : p.startsWith("~/") ? `${home}${p.slice(1)}` : p;
