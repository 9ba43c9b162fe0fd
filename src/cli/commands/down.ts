// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stop stacks, highest priority value first.
 */

import { Effect } from "effect";
import { STOPPING, stopStacks } from "../../stack/orchestrator";
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

export interface DownOptions {
  readonly ctx: CommandContext;
  readonly selection: SelectionOptions;
}

export const executeDown = (options: DownOptions): CommandEffect =>
  Effect.gen(function* () {
    const { request, stacks: selected } = yield* selectStacks(options.ctx, options.selection);
    if (selected.length === 0) {
      return yield* logNothingSelected(request);
    }

    const stacks = stopOrder(selected);
    yield* Effect.logInfo(`Stopping ${plural(stacks.length, "stack")}...`);
    const report = yield* stopStacks(stacks);
    yield* reportBatch(report, STOPPING);
  });
