#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * stackctl - Docker Compose stack manager
 *
 * Main entry point for the CLI application.
 * This is the "imperative shell" - the only place where Effect runtime is executed.
 */

import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Option } from "effect";
import { defectMessage, exitCodeFromExit } from "./cli/exit";
import { cli } from "./cli/index";

NodeRuntime.runMain(cli(process.argv).pipe(Effect.provide(NodeContext.layer)), {
  disableErrorReporting: true,
  disablePrettyLogger: true,
  teardown: (exit, onExit) => {
    const defect = defectMessage(exit);
    if (Option.isSome(defect)) {
      process.stderr.write(`${defect.value}\n`);
    }
    onExit(exitCodeFromExit(exit));
  },
});
