// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Tag management: list with usage counts, add and remove on one stack,
 * rename across every stack.
 */

import { Array as Arr, Effect } from "effect";
import { logSuccess, writeOutput } from "../../lib/log";
import { addTags, allTags, removeTags, renameTag, tagUsage } from "../../stack/registry";
import type { Registry } from "../../stack/registry";
import { type CommandContext, type CommandEffect, plural } from "./utils";

export const formatTagList = (registry: Registry): readonly string[] => {
  const tags = allTags(registry);
  if (tags.length === 0) {
    return ["No tags found"];
  }
  return [
    "",
    `Found ${tags.length} unique tag(s):`,
    "",
    ...Arr.map(tags, (tag) => `  • ${tag} (${plural(tagUsage(registry, tag), "stack")})`),
  ];
};

export const executeTagList = (ctx: CommandContext): CommandEffect =>
  writeOutput(formatTagList(ctx.registry).join("\n"));

export const executeTagAdd = (
  ctx: CommandContext,
  name: string,
  tags: readonly string[]
): CommandEffect =>
  Effect.gen(function* () {
    const added = yield* addTags(ctx.registry, name, tags);
    yield* added.length > 0
      ? logSuccess(`Added tag(s) to ${name}: ${added.join(", ")}`)
      : Effect.logInfo(`All specified tags already exist on ${name}`);
  });

export const executeTagRemove = (
  ctx: CommandContext,
  name: string,
  tags: readonly string[]
): CommandEffect =>
  Effect.gen(function* () {
    const removed = yield* removeTags(ctx.registry, name, tags);
    yield* removed.length > 0
      ? logSuccess(`Removed tag(s) from ${name}: ${removed.join(", ")}`)
      : Effect.logInfo(`None of the specified tags were found on ${name}`);
  });

export const executeTagRename = (
  ctx: CommandContext,
  oldTag: string,
  newTag: string
): CommandEffect =>
  Effect.gen(function* () {
    const count = yield* renameTag(ctx.registry, oldTag, newTag);
    yield* count > 0
      ? logSuccess(`Renamed '${oldTag}' to '${newTag}' across ${plural(count, "stack")}`)
      : Effect.logWarning(`Tag '${oldTag}' not found on any stacks`);
  });
