// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { Path } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import type { ConfigError } from "../lib/errors";
import { expandHome, toAbsolutePathEffect } from "../lib/paths";
import type { AbsolutePath } from "../lib/types";
import type { EnvConfig } from "./env";
import type { LogFormat, LogLevel } from "./field-values";
import type { GlobalConfig } from "./schema";

export interface ConfigField<A> {
  readonly cli: Option.Option<A>;
  readonly env: Option.Option<A>;
  readonly toml: Option.Option<A>;
  readonly fallback: A;
}

export const resolve = <A>(field: ConfigField<A>): A =>
  pipe(
    field.cli,
    Option.orElse(() => field.env),
    Option.orElse(() => field.toml),
    Option.getOrElse(() => field.fallback)
  );

/** Values supplied on the command line; every field is optional. */
export interface CliOverrides {
  readonly root: Option.Option<string>;
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly verbose: boolean;
  readonly json: boolean;
}

export interface Settings {
  readonly root: AbsolutePath;
  readonly manifestNames: readonly [string, ...string[]];
  readonly metadataFile: string;
  readonly composeCommand: readonly [string, ...string[]];
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
}

const whenTrue = <A>(flag: boolean, value: A): Option.Option<A> =>
  flag ? Option.some(value) : Option.none();

/** `--verbose` and STACKCTL_DEBUG both force the debug level at their own tier. */
export const resolveLogLevel = (cli: CliOverrides, env: EnvConfig, file: GlobalConfig): LogLevel =>
  resolve({
    cli: pipe(
      whenTrue<LogLevel>(cli.verbose, "debug"),
      Option.orElse(() => cli.logLevel)
    ),
    env: pipe(
      whenTrue<LogLevel>(env.debug, "debug"),
      Option.orElse(() => env.logLevel)
    ),
    toml: Option.some(file.logging.level),
    fallback: file.logging.level,
  });

export const resolveLogFormat = (cli: CliOverrides, env: EnvConfig, file: GlobalConfig): LogFormat =>
  resolve({
    cli: pipe(
      whenTrue<LogFormat>(cli.json, "json"),
      Option.orElse(() => cli.logFormat)
    ),
    env: env.logFormat,
    toml: Option.some(file.logging.format),
    fallback: file.logging.format,
  });

/**
 * Merges CLI, environment, TOML and built-in values. The root defaults
 * to the working directory and is always made absolute.
 */
export const resolveSettings = (
  cli: CliOverrides,
  env: EnvConfig,
  file: GlobalConfig
): Effect.Effect<Settings, ConfigError, Path.Path> =>
  Effect.gen(function* () {
    const rootInput = resolve({
      cli: cli.root,
      env: env.root,
      toml: Option.fromNullable(file.discovery.root),
      fallback: ".",
    });
    const root = yield* toAbsolutePathEffect(expandHome(rootInput, env.home));
    return {
      root,
      manifestNames: file.discovery.manifestNames,
      metadataFile: file.discovery.metadataFile,
      composeCommand: file.compose.command,
      logLevel: resolveLogLevel(cli, env, file),
      logFormat: resolveLogFormat(cli, env, file),
    };
  });
