// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions. Sharing these ensures consistent naming
 * and descriptions across commands, and enables type-safe composition.
 */

import { Args as A, Options as O } from "@effect/cli";
import type { Args } from "@effect/cli/Args";
import type { Options } from "@effect/cli/Options";
import { Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

// Shared positional arguments

export const stackArg: Args<string> = A.text({ name: "stack" }).pipe(
  A.withDescription("Stack name (relative directory, path separators replaced by '-')")
);

export const optionalStackArg: Args<Option.Option<string>> = A.text({ name: "stack" }).pipe(
  A.withDescription("Stack name"),
  A.optional
);

export const stacksArg: Args<Array<string>> = A.text({ name: "stacks" }).pipe(
  A.withDescription("Stack names"),
  A.repeated
);

export const tagsArg: Args<[string, ...string[]]> = A.text({ name: "tags" }).pipe(
  A.withDescription("One or more tags"),
  A.atLeast(1)
);

export const termArg: Args<string> = A.text({ name: "term" }).pipe(
  A.withDescription("Text matched against names, descriptions and tags")
);

export const oldNameArg: Args<string> = A.text({ name: "old" });
export const newNameArg: Args<string> = A.text({ name: "new" });

export const categoryArg: Args<string> = A.text({ name: "category" });

export const subcategoryArg: Args<Option.Option<string>> = A.text({ name: "subcategory" }).pipe(
  A.optional
);

// Global options (spread into every command)

export const globalOptions: {
  readonly root: Options<Option.Option<string>>;
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly json: Options<boolean>;
  readonly globalConfig: Options<Option.Option<string>>;
} = {
  root: O.directory("root").pipe(
    O.withAlias("r"),
    O.withDescription("Directory scanned for stacks (default: current directory)"),
    O.optional
  ),
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  globalConfig: O.text("global-config").pipe(
    O.withAlias("g"),
    O.withDescription("Path to global configuration file"),
    O.optional
  ),
};

// Selection options

export const allFlag: Options<boolean> = O.boolean("all").pipe(
  O.withDescription("Select every stack")
);

export const categoryOption: Options<Option.Option<string>> = O.text("category").pipe(
  O.withAlias("c"),
  O.withDescription("Select stacks in this category"),
  O.optional
);

export const tagOption: Options<Option.Option<string>> = O.text("tag").pipe(
  O.withAlias("t"),
  O.withDescription("Select stacks carrying this tag"),
  O.optional
);

export const selectionOptions: {
  readonly all: Options<boolean>;
  readonly category: Options<Option.Option<string>>;
  readonly tag: Options<Option.Option<string>>;
} = {
  all: allFlag,
  category: categoryOption,
  tag: tagOption,
};

// Per-command options

export const priorityFlag: Options<boolean> = O.boolean("priority").pipe(
  O.withDescription("Start in priority order")
);

export const withDepsFlag: Options<boolean> = O.boolean("with-deps").pipe(
  O.withDescription("Start dependencies first")
);

export const follow: Options<boolean> = O.boolean("follow").pipe(
  O.withAlias("f"),
  O.withDescription("Follow log output (tail -f style)")
);

export const since: Options<Option.Option<string>> = O.text("since").pipe(
  O.withDescription("Show logs since timestamp (e.g. 2024-01-01T00:00:00) or relative (e.g. 42m)"),
  O.optional
);

export const until: Options<Option.Option<string>> = O.text("until").pipe(
  O.withDescription("Show logs before timestamp or relative time"),
  O.optional
);

export const tail: Options<Option.Option<string>> = O.text("tail").pipe(
  O.withAlias("n"),
  O.withDescription("Number of lines to show from the end of the logs (or 'all')"),
  O.optional
);

export const timestamps: Options<boolean> = O.boolean("timestamps").pipe(
  O.withDescription("Show timestamps")
);

// Type definitions

export interface GlobalOptions {
  readonly root: Option.Option<string>;
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly globalConfig: Option.Option<string>;
}

/** Resolves format: --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );
