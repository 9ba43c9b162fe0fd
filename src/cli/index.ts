// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * discovery, service layers and error display so each command stays
 * focused on its logic.
 */

import { Command, type ValidationError } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import type { FileSystem, Path } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import { ComposeExecutorLive } from "../compose";
import {
  EnvConfigSpec,
  type LogFormat,
  type Settings,
  loadGlobalConfig,
  resolveSettings,
} from "../config";
import { StackctlLoggerLive, colorize, detectColor } from "../lib/effect-logger";
import { type AppError, ConfigError, ErrorCode, type SystemError } from "../lib/errors";
import { STACKCTL_VERSION } from "../lib/version";
import { discover } from "../stack";

import { executeAutostart } from "./commands/autostart";
import {
  executeCategoryList,
  executeCategoryRename,
  executeCategorySet,
} from "./commands/category";
import { executeDown } from "./commands/down";
import { executeLogs } from "./commands/logs";
import { executeList } from "./commands/ls";
import { executeRestart } from "./commands/restart";
import { executeSearch } from "./commands/search";
import { executeShow } from "./commands/show";
import { executeStatus } from "./commands/status";
import { executeTagAdd, executeTagList, executeTagRemove, executeTagRename } from "./commands/tag";
import { executeUp } from "./commands/up";
import type { CommandContext, CommandEffect } from "./commands/utils";
import { executeValidate } from "./commands/validate";

import {
  type GlobalOptions,
  categoryArg,
  categoryOption,
  effectiveFormat,
  follow,
  globalOptions,
  newNameArg,
  oldNameArg,
  optionalStackArg,
  priorityFlag,
  selectionOptions,
  since,
  stackArg,
  stacksArg,
  subcategoryArg,
  tagOption,
  tagsArg,
  tail,
  termArg,
  timestamps,
  until,
  withDepsFlag,
} from "./options";

// Context resolution

/** CLI args > env vars > config file > defaults. */
const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<Settings, ConfigError | SystemError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const file = yield* loadGlobalConfig(globals.globalConfig);
    const env = yield* Effect.mapError(
      EnvConfigSpec,
      (e) =>
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid environment configuration: ${String(e)}`,
        })
    );
    return yield* resolveSettings(
      {
        root: globals.root,
        logLevel: globals.logLevel,
        logFormat: globals.format,
        verbose: globals.verbose,
        json: globals.json,
      },
      env,
      file
    );
  });

// Error display

/** Written once per failed command; the entry point only maps the exit code. */
const displayError = (err: AppError, format: LogFormat): Effect.Effect<void> =>
  Effect.sync(() =>
    pipe(
      Match.value(format),
      Match.when("json", () =>
        process.stdout.write(`${JSON.stringify({ error: err.message, code: err.code })}\n`)
      ),
      Match.when("pretty", () =>
        process.stderr.write(`${colorize("red", "✗", detectColor())} ${err.message}\n`)
      ),
      Match.exhaustive
    )
  );

// Command runner

const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => CommandEffect
): Effect.Effect<void, AppError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const settings = yield* Effect.tapError(resolveContext(globals), (err) =>
      displayError(
        err,
        Option.getOrElse(effectiveFormat(globals), (): LogFormat => "pretty")
      )
    );

    yield* pipe(
      Effect.gen(function* () {
        const registry = yield* discover(settings.root, {
          manifestNames: settings.manifestNames,
          metadataFile: settings.metadataFile,
        });
        yield* handler({ settings, format: settings.logFormat, registry });
      }),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => displayError(err, settings.logFormat)),
      Effect.provide(ComposeExecutorLive(settings.composeCommand)),
      Effect.provide(StackctlLoggerLive({ level: settings.logLevel, format: settings.logFormat }))
    );
  });

// Listing and inspection

const listConfig = { ...globalOptions, category: categoryOption, tag: tagOption };

const listHandler = (args: GlobalOptions & {
  readonly category: Option.Option<string>;
  readonly tag: Option.Option<string>;
}): Effect.Effect<void, AppError, FileSystem.FileSystem | Path.Path> =>
  runCommand(args, "ls", (ctx) => executeList({ ctx, category: args.category, tag: args.tag }));

const lsCmd = Command.make("ls", listConfig, listHandler).pipe(
  Command.withDescription("List stacks grouped by category")
);

const listCmd = Command.make("list", listConfig, listHandler).pipe(
  Command.withDescription("List stacks grouped by category (alias of ls)")
);

const showCmd = Command.make("show", { ...globalOptions, stack: stackArg }, (args) =>
  runCommand(args, "show", (ctx) => executeShow({ ctx, name: args.stack }))
).pipe(Command.withDescription("Show the metadata and status of one stack"));

const statusCmd = Command.make(
  "status",
  { ...globalOptions, category: categoryOption, tag: tagOption },
  (args) =>
    runCommand(args, "status", (ctx) =>
      executeStatus({ ctx, category: args.category, tag: args.tag })
    )
).pipe(Command.withDescription("Show a status table for stacks"));

const searchCmd = Command.make("search", { ...globalOptions, term: termArg }, (args) =>
  runCommand(args, "search", (ctx) => executeSearch({ ctx, term: args.term }))
).pipe(Command.withDescription("Search stack names, descriptions and tags"));

const validateCmd = Command.make(
  "validate",
  { ...globalOptions, stack: optionalStackArg },
  (args) => runCommand(args, "validate", (ctx) => executeValidate({ ctx, target: args.stack }))
).pipe(Command.withDescription("Check manifests, metadata and dependencies"));

// Lifecycle

const upCmd = Command.make(
  "up",
  {
    ...globalOptions,
    stack: optionalStackArg,
    ...selectionOptions,
    priority: priorityFlag,
    withDeps: withDepsFlag,
  },
  (args) =>
    runCommand(args, "up", (ctx) =>
      executeUp({
        ctx,
        selection: { target: args.stack, all: args.all, category: args.category, tag: args.tag },
        priority: args.priority,
        withDeps: args.withDeps,
      })
    )
).pipe(Command.withDescription("Start stacks"));

const downCmd = Command.make(
  "down",
  { ...globalOptions, stack: optionalStackArg, ...selectionOptions },
  (args) =>
    runCommand(args, "down", (ctx) =>
      executeDown({
        ctx,
        selection: { target: args.stack, all: args.all, category: args.category, tag: args.tag },
      })
    )
).pipe(Command.withDescription("Stop stacks"));

const restartCmd = Command.make(
  "restart",
  { ...globalOptions, stack: optionalStackArg, ...selectionOptions },
  (args) =>
    runCommand(args, "restart", (ctx) =>
      executeRestart({
        ctx,
        selection: { target: args.stack, all: args.all, category: args.category, tag: args.tag },
      })
    )
).pipe(Command.withDescription("Restart stacks"));

const autostartCmd = Command.make("autostart", { ...globalOptions }, (args) =>
  runCommand(args, "autostart", (ctx) => executeAutostart({ ctx }))
).pipe(Command.withDescription("Start every stack marked auto_start, in priority order"));

const logsCmd = Command.make(
  "logs",
  {
    ...globalOptions,
    stacks: stacksArg,
    ...selectionOptions,
    follow,
    since,
    until,
    tail,
    timestamps,
  },
  (args) =>
    runCommand(args, "logs", (ctx) =>
      executeLogs({
        ctx,
        selection: {
          stacks: args.stacks,
          all: args.all,
          category: args.category,
          tag: args.tag,
        },
        logOptions: {
          follow: args.follow,
          since: args.since,
          until: args.until,
          tail: args.tail,
          timestamps: args.timestamps,
        },
      })
    )
).pipe(Command.withDescription("Show logs for one or more stacks"));

// Tag subcommands

const tagListHandler = (
  args: GlobalOptions
): Effect.Effect<void, AppError, FileSystem.FileSystem | Path.Path> =>
  runCommand(args, "tag-ls", executeTagList);

const tagLsCmd = Command.make("ls", { ...globalOptions }, tagListHandler).pipe(
  Command.withDescription("List tags with usage counts")
);

const tagListCmd = Command.make("list", { ...globalOptions }, tagListHandler).pipe(
  Command.withDescription("List tags with usage counts (alias of ls)")
);

const tagAddCmd = Command.make(
  "add",
  { ...globalOptions, stack: stackArg, tags: tagsArg },
  (args) => runCommand(args, "tag-add", (ctx) => executeTagAdd(ctx, args.stack, args.tags))
).pipe(Command.withDescription("Add tags to a stack"));

const tagRemoveCmd = Command.make(
  "remove",
  { ...globalOptions, stack: stackArg, tags: tagsArg },
  (args) => runCommand(args, "tag-remove", (ctx) => executeTagRemove(ctx, args.stack, args.tags))
).pipe(Command.withDescription("Remove tags from a stack"));

const tagRenameCmd = Command.make(
  "rename",
  { ...globalOptions, old: oldNameArg, new: newNameArg },
  (args) => runCommand(args, "tag-rename", (ctx) => executeTagRename(ctx, args.old, args.new))
).pipe(Command.withDescription("Rename a tag across every stack"));

const tagCmd = Command.make("tag").pipe(
  Command.withDescription("Manage stack tags"),
  Command.withSubcommands([tagLsCmd, tagListCmd, tagAddCmd, tagRemoveCmd, tagRenameCmd])
);

// Category subcommands

const categoryListHandler = (
  args: GlobalOptions
): Effect.Effect<void, AppError, FileSystem.FileSystem | Path.Path> =>
  runCommand(args, "category-ls", executeCategoryList);

const categoryLsCmd = Command.make("ls", { ...globalOptions }, categoryListHandler).pipe(
  Command.withDescription("List categories with usage counts")
);

const categoryListCmd = Command.make("list", { ...globalOptions }, categoryListHandler).pipe(
  Command.withDescription("List categories with usage counts (alias of ls)")
);

const categorySetCmd = Command.make(
  "set",
  { ...globalOptions, stack: stackArg, category: categoryArg, subcategory: subcategoryArg },
  (args) =>
    runCommand(args, "category-set", (ctx) =>
      executeCategorySet(
        ctx,
        args.stack,
        args.category,
        Option.getOrElse(args.subcategory, () => "")
      )
    )
).pipe(Command.withDescription("Set the category of a stack"));

const categoryRenameCmd = Command.make(
  "rename",
  { ...globalOptions, old: oldNameArg, new: newNameArg },
  (args) =>
    runCommand(args, "category-rename", (ctx) => executeCategoryRename(ctx, args.old, args.new))
).pipe(Command.withDescription("Rename a category across every stack"));

const categorySubcommands = [
  categoryLsCmd,
  categoryListCmd,
  categorySetCmd,
  categoryRenameCmd,
] as const;

const categoryCmd = Command.make("category").pipe(
  Command.withDescription("Manage stack categories"),
  Command.withSubcommands(categorySubcommands)
);

const catCmd = Command.make("cat").pipe(
  Command.withDescription("Manage stack categories (alias of category)"),
  Command.withSubcommands(categorySubcommands)
);

// Root command

const stackctl = Command.make("stackctl").pipe(
  Command.withDescription("Docker Compose stack manager"),
  Command.withSubcommands([
    lsCmd,
    listCmd,
    showCmd,
    upCmd,
    downCmd,
    restartCmd,
    statusCmd,
    searchCmd,
    autostartCmd,
    validateCmd,
    tagCmd,
    categoryCmd,
    catCmd,
    logsCmd,
  ])
);

export const cli: (
  args: readonly string[]
) => Effect.Effect<void, AppError | ValidationError.ValidationError, CliApp.Environment> =
  Command.run(stackctl, {
    name: "stackctl",
    version: STACKCTL_VERSION,
  });
