// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * ComposeExecutor: the lifecycle collaborator behind every stack action.
 * start/stop report failure as `false` so batches carry on past a bad
 * stack; status degrades to "stopped 0/0" when compose cannot answer.
 */

import { Context, Effect, Either, Layer, Option, type Stream, pipe } from "effect";
import { COMPOSE_COMMAND_DEFAULT } from "../config/field-values";
import { type SystemError, errorMessage } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { type CommandLine, exec, execInherit, execLines } from "../system/exec";
import { STOPPED, type StackStatus, parseComposePs } from "./status";

export interface LogOptions {
  readonly follow: boolean;
  readonly since: Option.Option<string>;
  readonly until: Option.Option<string>;
  readonly tail: Option.Option<string>;
  readonly timestamps: boolean;
}

export const DEFAULT_LOG_OPTIONS: LogOptions = {
  follow: false,
  since: Option.none(),
  until: Option.none(),
  tail: Option.none(),
  timestamps: false,
};

export interface StartOptions {
  readonly detached: boolean;
}

export interface ComposeExecutorValue {
  readonly start: (path: AbsolutePath, options: StartOptions) => Effect.Effect<boolean>;
  readonly stop: (path: AbsolutePath) => Effect.Effect<boolean>;
  readonly status: (path: AbsolutePath) => Effect.Effect<StackStatus>;
  readonly logs: (path: AbsolutePath, options: LogOptions) => Stream.Stream<string, SystemError>;
}

/**
 * ComposeExecutor tag identifier type.
 */
export interface ComposeExecutor {
  readonly _tag: "ComposeExecutor";
}

export const ComposeExecutor: Context.Tag<ComposeExecutor, ComposeExecutorValue> =
  Context.GenericTag<ComposeExecutor, ComposeExecutorValue>("stackctl/ComposeExecutor");

const flag = (enabled: boolean, name: string): readonly string[] => (enabled ? [name] : []);

const valued = (value: Option.Option<string>, name: string): readonly string[] =>
  Option.match(value, { onNone: () => [], onSome: (v) => [name, v] });

export const upArgs = (options: StartOptions): readonly string[] => [
  "up",
  ...flag(options.detached, "-d"),
];

export const logsArgs = (options: LogOptions): readonly string[] => [
  "logs",
  ...flag(options.follow, "--follow"),
  ...valued(options.since, "--since"),
  ...valued(options.tail, "--tail"),
  ...flag(options.timestamps, "--timestamps"),
  ...valued(options.until, "--until"),
];

const withArgs = (base: CommandLine, args: readonly string[]): CommandLine => {
  const [cmd, ...rest] = base;
  return [cmd, ...rest, ...args];
};

/** Runs a lifecycle command, turning every failure into `false`. */
const runLifecycle = (command: CommandLine, path: AbsolutePath): Effect.Effect<boolean> =>
  pipe(
    execInherit(command, { cwd: path }),
    Effect.flatMap((code) =>
      code === 0
        ? Effect.succeed(true)
        : Effect.as(
            Effect.logError(`${command.join(" ")} exited with code ${code} in ${path}`),
            false
          )
    ),
    Effect.catchAll((e) => Effect.as(Effect.logError(errorMessage(e)), false))
  );

const readStatus = (command: CommandLine, path: AbsolutePath): Effect.Effect<StackStatus> =>
  pipe(
    exec(command, { cwd: path }),
    Effect.flatMap((result) =>
      result.exitCode === 0
        ? Either.match(parseComposePs(result.stdout), {
            onLeft: (reason) =>
              Effect.as(Effect.logDebug(`Unreadable compose ps output in ${path}: ${reason}`), STOPPED),
            onRight: (status) => Effect.succeed(status),
          })
        : Effect.as(
            Effect.logDebug(`compose ps exited with code ${result.exitCode} in ${path}`),
            STOPPED
          )
    ),
    Effect.catchAll((e) => Effect.as(Effect.logDebug(errorMessage(e)), STOPPED))
  );

export const makeComposeExecutor = (compose: CommandLine): ComposeExecutorValue => ({
  start: (path, options) => runLifecycle(withArgs(compose, upArgs(options)), path),
  stop: (path) => runLifecycle(withArgs(compose, ["down"]), path),
  status: (path) => readStatus(withArgs(compose, ["ps", "--format", "json"]), path),
  logs: (path, options) => execLines(withArgs(compose, logsArgs(options)), { cwd: path }),
});

export const ComposeExecutorLive = (
  compose: CommandLine = COMPOSE_COMMAND_DEFAULT
): Layer.Layer<ComposeExecutor> => Layer.succeed(ComposeExecutor, makeComposeExecutor(compose));
