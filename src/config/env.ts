// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 * All exports are pure Config values; they are only read at the CLI
 * boundary, which keeps tests free to swap in a ConfigProvider.
 */

import { Config, ConfigProvider, type Option } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, type LogFormat, type LogLevel } from "./field-values";

/** HOME, falling back to /root (common in containers). */
export const HomeConfig: Config.Config<string> = Config.string("HOME").pipe(
  Config.withDefault("/root")
);

/** STACKCTL_ROOT: directory scanned for compose stacks. */
export const RootOptionConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.option(Config.nonEmptyString("ROOT")),
  "STACKCTL"
);

/** STACKCTL_LOG_LEVEL, absent unless explicitly set. */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")),
  "STACKCTL"
);

/** STACKCTL_LOG_FORMAT, absent unless explicitly set. */
export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")),
  "STACKCTL"
);

/** STACKCTL_DEBUG=true forces the debug log level. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "STACKCTL"
);

export interface EnvConfig {
  readonly home: string;
  readonly root: Option.Option<string>;
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly debug: boolean;
}

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all({
  home: HomeConfig,
  root: RootOptionConfig,
  logLevel: LogLevelOptionConfig,
  logFormat: LogFormatOptionConfig,
  debug: DebugModeConfig,
});

export interface TestConfigOverrides {
  readonly home?: string;
  readonly root?: string;
  readonly logLevel?: string;
  readonly logFormat?: string;
  readonly debug?: string;
}

/** Provider backed by a map of the real variable names, for tests. */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const entries: readonly (readonly [string, string | undefined])[] = [
    ["HOME", overrides.home ?? "/home/testuser"],
    ["STACKCTL_ROOT", overrides.root],
    ["STACKCTL_LOG_LEVEL", overrides.logLevel],
    ["STACKCTL_LOG_FORMAT", overrides.logFormat],
    ["STACKCTL_DEBUG", overrides.debug],
  ];
  const values = new Map<string, string>();
  for (const [key, value] of entries) {
    if (value !== undefined) {
      values.set(key, value);
    }
  }
  return ConfigProvider.fromMap(values, { pathDelim: "_" });
};
