// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. Files are
 * parsed and validated in a single pass - syntax errors and schema
 * violations are reported immediately with file path context. The
 * global config searches ~/.config and ./, but an explicit path fails
 * on any error to catch typos and permission issues.
 */

import { FileSystem, type Path } from "@effect/platform";
import { Effect, Option, type Schema, pipe } from "effect";
import * as TOML from "smol-toml";
import { ConfigError, ErrorCode, SystemError, causeOf, errorMessage } from "../lib/errors";
import { expandHome, toAbsolutePathEffect } from "../lib/paths";
import { decodeToEffect, decodeUnsafe } from "../lib/schema-utils";
import type { AbsolutePath } from "../lib/types";
import { HomeConfig } from "./env";
import { type GlobalConfig, GlobalConfigSchema } from "./schema";

export const CONFIG_FILE_NAME = "stackctl.toml";

export const loadTomlFile = <A, I>(
  filePath: AbsolutePath,
  schema: Schema.Schema<A, I, never>
): Effect.Effect<A, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    yield* pipe(
      fs.exists(filePath),
      Effect.orElseSucceed(() => false),
      Effect.filterOrFail(
        (exists): exists is true => exists === true,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );

    const content = yield* pipe(
      fs.readFileString(filePath),
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read ${filePath}: ${errorMessage(e)}`,
            ...causeOf(e),
          })
      )
    );

    const parsed = yield* Effect.try({
      try: (): unknown => TOML.parse(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          ...causeOf(e),
        }),
    });

    return yield* decodeToEffect(schema, parsed, filePath);
  });

/** Search order when no explicit path is given. */
export const defaultConfigPaths = (home: string): readonly string[] => [
  `${home}/.config/stackctl/${CONFIG_FILE_NAME}`,
  `./${CONFIG_FILE_NAME}`,
];

export const defaultGlobalConfig = (): GlobalConfig => decodeUnsafe(GlobalConfigSchema, {});

export const loadGlobalConfigWithHome = (
  configPath: Option.Option<string>,
  home: string
): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem | Path.Path> => {
  const tryLoadPath = (
    p: string
  ): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem | Path.Path> =>
    pipe(
      toAbsolutePathEffect(expandHome(p, home)),
      Effect.flatMap((absPath) => loadTomlFile(absPath, GlobalConfigSchema))
    );

  // A present file that fails to parse or validate is an error even on the
  // default search path; only absence moves on to the next candidate.
  const tryDefaultPath = (
    p: string
  ): Effect.Effect<Option.Option<GlobalConfig>, ConfigError | SystemError, FileSystem.FileSystem | Path.Path> =>
    pipe(
      tryLoadPath(p),
      Effect.map(Option.some),
      Effect.catchIf(
        (e) => e._tag === "ConfigError" && e.code === ErrorCode.CONFIG_NOT_FOUND,
        () => Effect.succeed(Option.none<GlobalConfig>())
      )
    );

  const searchDefaults = (
    remaining: readonly string[]
  ): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem | Path.Path> => {
    const [head, ...rest] = remaining;
    return head === undefined
      ? Effect.sync(defaultGlobalConfig)
      : pipe(
          tryDefaultPath(head),
          Effect.flatMap((found) =>
            Option.match(found, {
              onNone: () => searchDefaults(rest),
              onSome: (config) =>
                Effect.as(Effect.logDebug(`Loaded global config from ${head}`), config),
            })
          )
        );
  };

  return Option.match(configPath, {
    onNone: () => searchDefaults(defaultConfigPaths(home)),
    onSome: tryLoadPath,
  });
};

/** Returns default values if no config file is found. */
export const loadGlobalConfig = (
  configPath: Option.Option<string>
): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    // HomeConfig has a default, so orDie is safe
    const home = yield* Effect.orDie(HomeConfig);
    return yield* loadGlobalConfigWithHome(configPath, home);
  });
