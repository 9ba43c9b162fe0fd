// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stack lifecycle orchestration through the ComposeExecutor. Batches run
 * one stack at a time in the order given; a failed stack is recorded and
 * the batch moves on. Ordering is the caller's job (see order.ts).
 */

import { Array as Arr, Chunk, Effect, Stream, pipe } from "effect";
import { ComposeExecutor, type LogOptions } from "../compose/executor";
import type { StackStatus } from "../compose/status";
import type { SystemError } from "../lib/errors";
import { logFail, logStep, logSuccess, writeOutput } from "../lib/log";
import type { Stack } from "./types";

export interface BatchVerb {
  /** "Starting" */
  readonly progressive: string;
  /** "started" */
  readonly past: string;
}

export const STARTING: BatchVerb = { progressive: "Starting", past: "started" };
export const STOPPING: BatchVerb = { progressive: "Stopping", past: "stopped" };
export const RESTARTING: BatchVerb = { progressive: "Restarting", past: "restarted" };

export interface BatchResult {
  readonly stack: Stack;
  readonly ok: boolean;
}

export interface BatchReport {
  readonly results: readonly BatchResult[];
  readonly succeeded: number;
  readonly failed: number;
}

export const summarizeBatch = (results: readonly BatchResult[]): BatchReport => {
  const succeeded = Arr.filter(results, (r) => r.ok).length;
  return { results, succeeded, failed: results.length - succeeded };
};

/** Runs `action` on each stack in order, logging a step and an outcome line per stack. */
export const runBatch = <R>(
  stacks: readonly Stack[],
  action: (stack: Stack) => Effect.Effect<boolean, never, R>,
  verb: BatchVerb
): Effect.Effect<BatchReport, never, R> =>
  pipe(
    Effect.forEach(stacks, (stack, i) =>
      pipe(
        logStep(i + 1, stacks.length, `${verb.progressive} ${stack.name}`),
        Effect.andThen(action(stack)),
        Effect.tap((ok) =>
          ok
            ? logSuccess(`${stack.name} ${verb.past}`)
            : logFail(`${stack.name}: ${verb.progressive.toLowerCase()} failed`)
        ),
        Effect.map((ok): BatchResult => ({ stack, ok }))
      )
    ),
    Effect.map(summarizeBatch)
  );

export const startStacks = (
  stacks: readonly Stack[],
  options: { readonly detached: boolean } = { detached: true }
): Effect.Effect<BatchReport, never, ComposeExecutor> =>
  Effect.flatMap(ComposeExecutor, (compose) =>
    runBatch(stacks, (stack) => compose.start(stack.path, options), STARTING)
  );

export const stopStacks = (
  stacks: readonly Stack[]
): Effect.Effect<BatchReport, never, ComposeExecutor> =>
  Effect.flatMap(ComposeExecutor, (compose) =>
    runBatch(stacks, (stack) => compose.stop(stack.path), STOPPING)
  );

/** Stop then start per stack; the start is skipped when the stop failed. */
export const restartStacks = (
  stacks: readonly Stack[]
): Effect.Effect<BatchReport, never, ComposeExecutor> =>
  Effect.flatMap(ComposeExecutor, (compose) =>
    runBatch(
      stacks,
      (stack) =>
        Effect.flatMap(compose.stop(stack.path), (stopped) =>
          stopped ? compose.start(stack.path, { detached: true }) : Effect.succeed(false)
        ),
      RESTARTING
    )
  );

// ============================================================================
// Status
// ============================================================================

/** "degraded": running, but with fewer containers than the stack expects. */
export type StackHealth = "running" | "stopped" | "degraded";

export interface StatusEntry {
  readonly stack: Stack;
  readonly status: StackStatus;
  readonly health: StackHealth;
}

export interface StatusSummary {
  readonly total: number;
  readonly running: number;
  readonly stopped: number;
  readonly degraded: number;
}

export interface StatusReport {
  readonly entries: readonly StatusEntry[];
  readonly summary: StatusSummary;
}

export const healthOf = (stack: Stack, status: StackStatus): StackHealth => {
  if (status.state === "stopped") {
    return "stopped";
  }
  return stack.expectedContainers > 0 && status.runningContainers < stack.expectedContainers
    ? "degraded"
    : "running";
};

export const summarizeStatuses = (entries: readonly StatusEntry[]): StatusSummary => {
  const count = (health: StackHealth): number =>
    Arr.filter(entries, (e) => e.health === health).length;
  return {
    total: entries.length,
    running: count("running"),
    stopped: count("stopped"),
    degraded: count("degraded"),
  };
};

/** Queries are independent, so a few run at once; entries keep input order. */
export const collectStatuses = (
  stacks: readonly Stack[]
): Effect.Effect<StatusReport, never, ComposeExecutor> =>
  Effect.gen(function* () {
    const compose = yield* ComposeExecutor;
    const entries = yield* Effect.forEach(
      stacks,
      (stack) =>
        Effect.map(
          compose.status(stack.path),
          (status): StatusEntry => ({ stack, status, health: healthOf(stack, status) })
        ),
      { concurrency: 4 }
    );
    return { entries, summary: summarizeStatuses(entries) };
  });

// ============================================================================
// Logs
// ============================================================================

const prefixed = (
  stack: Stack,
  lines: Stream.Stream<string, SystemError>
): Stream.Stream<string, SystemError> =>
  Stream.map(lines, (line) => `[${stack.name}] ${line}`);

/**
 * One stack: its lines as they are. Several stacks with follow: all
 * streams at once, interleaved by arrival. Several without follow: one
 * stack after another. With more than one stack every line carries a
 * `[name] ` prefix.
 */
export const logLines = (
  stacks: readonly Stack[],
  options: LogOptions
): Stream.Stream<string, SystemError, ComposeExecutor> =>
  Stream.unwrap(
    Effect.map(ComposeExecutor, (compose): Stream.Stream<string, SystemError> => {
      const [only, ...rest] = stacks;
      if (only === undefined) {
        return Stream.empty;
      }
      if (rest.length === 0) {
        return compose.logs(only.path, options);
      }
      const streams = Arr.map(stacks, (stack) => prefixed(stack, compose.logs(stack.path, options)));
      return options.follow
        ? Stream.mergeAll(streams, { concurrency: "unbounded" })
        : Stream.concatAll(Chunk.fromIterable(streams));
    })
  );

/** Writes log lines to stdout until the streams end or the fiber is interrupted. */
export const streamLogs = (
  stacks: readonly Stack[],
  options: LogOptions
): Effect.Effect<void, SystemError, ComposeExecutor> =>
  Stream.runForEach(logLines(stacks, options), writeOutput);
