// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Detailed view of one stack.
 */

import { Effect, Match, Option, pipe } from "effect";
import { ComposeExecutor } from "../../compose/executor";
import type { StackStatus } from "../../compose/status";
import { stackNotFound } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";
import { dependentsOf } from "../../stack/dependencies";
import { type StackHealth, type StatusEntry, healthOf } from "../../stack/orchestrator";
import { byName } from "../../stack/registry";
import { type Stack, categoryLabel } from "../../stack/types";
import { type CommandContext, type CommandEffect, orNone, rule, statusEntryToJson } from "./utils";

export interface ShowOptions {
  readonly ctx: CommandContext;
  readonly name: string;
}

const yesNo = (value: boolean): string => (value ? "yes" : "no");

const optionalLine = (label: string, value: string): readonly string[] =>
  value === "" ? [] : [`${label.padEnd(14)}${value}`];

export const formatShow = (
  stack: Stack,
  status: StackStatus,
  health: StackHealth,
  requiredBy: readonly string[]
): readonly string[] => [
  "",
  `Stack: ${stack.name}`,
  rule(),
  `Description:  ${stack.description === "" ? "N/A" : stack.description}`,
  `Category:     ${categoryLabel(stack.category, stack.subcategory)}`,
  `Tags:         ${orNone(stack.tags)}`,
  `Path:         ${stack.path}`,
  `Manifest:     ${stack.manifest}`,
  `Status:       ${health} (${status.runningContainers}/${status.totalContainers} containers)`,
  `Auto-start:   ${yesNo(stack.autoStart)}`,
  `Priority:     ${stack.priority}`,
  `Critical:     ${yesNo(stack.critical)}`,
  ...optionalLine("Dependencies:", stack.dependsOn.join(", ")),
  ...optionalLine("Required by:", requiredBy.join(", ")),
  ...(stack.expectedContainers > 0 ? [`Expected:     ${stack.expectedContainers} containers`] : []),
  ...optionalLine("Owner:", stack.owner),
  ...optionalLine("Docs:", stack.documentation),
  ...optionalLine("Health:", stack.healthCheckUrl),
];

export const executeShow = (options: ShowOptions): CommandEffect =>
  Effect.gen(function* () {
    const { ctx, name } = options;
    const stack = yield* Option.match(byName(ctx.registry, name), {
      onNone: () => Effect.fail(stackNotFound(name)),
      onSome: Effect.succeed,
    });
    const compose = yield* ComposeExecutor;
    const status = yield* compose.status(stack.path);
    const entry: StatusEntry = { stack, status, health: healthOf(stack, status) };
    const requiredBy = dependentsOf(stack.name, ctx.registry).map((s) => s.name);

    yield* pipe(
      Match.value(ctx.format),
      Match.when("json", () => writeJson({ ...statusEntryToJson(entry), requiredBy })),
      Match.when("pretty", () =>
        writeOutput(formatShow(stack, entry.status, entry.health, requiredBy).join("\n"))
      ),
      Match.exhaustive
    );
  });
