// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restart stacks one at a time in stop order: each is taken down and
 * brought back up before the next one is touched.
 */

import { Effect } from "effect";
import { RESTARTING, restartStacks } from "../../stack/orchestrator";
import { stopOrder } from "../../stack/order";
import type { SelectionOptions } from "../../stack/selector";
import {
  type CommandContext,
  type CommandEffect,
  logNothingSelected,
  plural,
  reportBatch,
  selectStacks,
} from "./utils";

export interface RestartOptions {
  readonly ctx: CommandContext;
  readonly selection: SelectionOptions;
}

export const executeRestart = (options: RestartOptions): CommandEffect =>
  Effect.gen(function* () {
    const { request, stacks: selected } = yield* selectStacks(options.ctx, options.selection);
    if (selected.length === 0) {
      return yield* logNothingSelected(request);
    }

    const stacks = stopOrder(selected);
    yield* Effect.logInfo(`Restarting ${plural(stacks.length, "stack")}...`);
    const report = yield* restartStacks(stacks);
    yield* reportBatch(report, RESTARTING);
  });
