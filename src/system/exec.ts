// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command execution via the @effect/platform Command API, with three
 * shapes of output handling:
 * - exec: capture stdout and stderr as strings
 * - execInherit: hand the terminal to the child, return its exit code
 * - execLines: stream complete output lines while the child runs
 */

import { Command } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Stream, pipe } from "effect";
import { ErrorCode, SystemError, causeOf, errorMessage } from "../lib/errors";

/** A program followed by its arguments. */
export type CommandLine = readonly [string, ...string[]];

export interface ExecOptions {
  readonly cwd?: string;
}

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/** Internalizes NodeContext.layer so callers don't need R type parameter. */
const withExecutor = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Effect.Effect<A, E> => effect.pipe(Effect.provide(NodeContext.layer));

const execError = (command: CommandLine, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${command.join(" ")}: ${errorMessage(e)}`,
    ...causeOf(e),
  });

const build = (command: CommandLine, options: ExecOptions): Command.Command => {
  const [cmd, ...args] = command;
  const base = Command.make(cmd, ...args);
  return options.cwd !== undefined ? Command.workingDirectory(base, options.cwd) : base;
};

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

const toLines = <E>(stream: Stream.Stream<Uint8Array, E>): Stream.Stream<string, E> =>
  pipe(stream, Stream.decodeText("utf-8"), Stream.splitLines);

export const exec = (
  command: CommandLine,
  options: ExecOptions = {}
): Effect.Effect<ExecResult, SystemError> =>
  withExecutor(
    Effect.gen(function* () {
      const process = yield* Command.start(build(command, options));

      // Parallel capture: exitCode + both streams ready independently
      const [exitCode, stdout, stderr] = yield* Effect.all(
        [process.exitCode, streamToString(process.stdout), streamToString(process.stderr)],
        { concurrency: 3 }
      );

      return { exitCode, stdout, stderr };
    }).pipe(Effect.scoped)
  ).pipe(Effect.mapError((e) => execError(command, e)));

/** Child output goes straight to this process's stdout and stderr. */
export const execInherit = (
  command: CommandLine,
  options: ExecOptions = {}
): Effect.Effect<number, SystemError> =>
  withExecutor(
    pipe(
      build(command, options),
      Command.stdout("inherit"),
      Command.stderr("inherit"),
      Command.exitCode
    )
  ).pipe(
    Effect.map((code) => Number(code)),
    Effect.mapError((e) => execError(command, e))
  );

/**
 * Lines from stdout and stderr, merged as they arrive. Interrupting the
 * consumer closes the scope, which kills the child.
 */
export const execLines = (
  command: CommandLine,
  options: ExecOptions = {}
): Stream.Stream<string, SystemError> =>
  pipe(
    Command.start(build(command, options)),
    Effect.map((process) =>
      pipe(
        Stream.merge(toLines(process.stdout), toLines(process.stderr)),
        Stream.concat(
          Stream.execute(
            Effect.flatMap(process.exitCode, (code) =>
              code === 0
                ? Effect.void
                : Effect.logWarning(`${command.join(" ")} exited with code ${code}`)
            )
          )
        )
      )
    ),
    Stream.unwrapScoped,
    Stream.mapError((e) => execError(command, e)),
    Stream.provideLayer(NodeContext.layer)
  );
