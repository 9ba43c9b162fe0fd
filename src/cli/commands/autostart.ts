// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Start every stack flagged `auto_start`, lowest priority value first.
 */

import { Effect } from "effect";
import { STARTING, startStacks } from "../../stack/orchestrator";
import { autostartSet } from "../../stack/registry";
import { type CommandContext, type CommandEffect, plural, reportBatch } from "./utils";

export interface AutostartOptions {
  readonly ctx: CommandContext;
}

export const executeAutostart = (options: AutostartOptions): CommandEffect =>
  Effect.gen(function* () {
    const stacks = autostartSet(options.ctx.registry);
    if (stacks.length === 0) {
      return yield* Effect.logInfo("No stacks configured for auto-start");
    }

    yield* Effect.logInfo(`Auto-starting ${plural(stacks.length, "stack")} by priority...`);
    const report = yield* startStacks(stacks);
    yield* reportBatch(report, STARTING);
  });
