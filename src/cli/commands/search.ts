// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Free-text search across stack names, descriptions and tags.
 */

import { Array as Arr, Effect, Match, pipe } from "effect";
import { writeJson, writeOutput } from "../../lib/log";
import { displayOrder } from "../../stack/order";
import { search } from "../../stack/registry";
import { type Stack, stackToJson } from "../../stack/types";
import { type CommandContext, type CommandEffect, plural } from "./utils";

export interface SearchOptions {
  readonly ctx: CommandContext;
  readonly term: string;
}

export const formatSearchResults = (term: string, results: readonly Stack[]): readonly string[] =>
  results.length === 0
    ? [`No stacks found matching '${term}'`]
    : [
        "",
        `Found ${plural(results.length, "stack")}:`,
        ...Arr.flatMap(results, (stack) => [
          "",
          `  • ${stack.name}`,
          `    ${stack.description === "" ? "No description" : stack.description}`,
          `    Category: ${stack.category}, Tags: ${stack.tags.join(", ")}`,
        ]),
      ];

export const executeSearch = (options: SearchOptions): CommandEffect => {
  const results = displayOrder(search(options.ctx.registry, options.term));
  return pipe(
    Match.value(options.ctx.format),
    Match.when("json", () => writeJson(Arr.map(results, stackToJson))),
    Match.when("pretty", () =>
      writeOutput(formatSearchResults(options.term, results).join("\n"))
    ),
    Match.exhaustive
  );
};
