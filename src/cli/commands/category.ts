// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Category management: list category/subcategory pairs with usage
 * counts, set the category of one stack, rename across every stack.
 */

import { Array as Arr, Effect } from "effect";
import { logSuccess, writeOutput } from "../../lib/log";
import {
  type Registry,
  allCategories,
  categoryUsage,
  renameCategory,
  setCategory,
} from "../../stack/registry";
import { categoryLabel } from "../../stack/types";
import { type CommandContext, type CommandEffect, plural } from "./utils";

export const formatCategoryList = (registry: Registry): readonly string[] => {
  const pairs = allCategories(registry);
  if (pairs.length === 0) {
    return ["No categories found"];
  }
  return [
    "",
    `Found ${plural(pairs.length, "unique category", "unique categories")}:`,
    "",
    ...Arr.map(
      pairs,
      ({ category, subcategory }) =>
        `  • ${categoryLabel(category, subcategory)} (${plural(categoryUsage(registry, category, subcategory), "stack")})`
    ),
  ];
};

export const executeCategoryList = (ctx: CommandContext): CommandEffect =>
  writeOutput(formatCategoryList(ctx.registry).join("\n"));

export const executeCategorySet = (
  ctx: CommandContext,
  name: string,
  category: string,
  subcategory: string
): CommandEffect =>
  Effect.gen(function* () {
    const change = yield* setCategory(ctx.registry, name, category, subcategory);
    yield* logSuccess(`Changed category for ${name}: ${change.previous} → ${change.current}`);
  });

export const executeCategoryRename = (
  ctx: CommandContext,
  oldCategory: string,
  newCategory: string
): CommandEffect =>
  Effect.gen(function* () {
    const count = yield* renameCategory(ctx.registry, oldCategory, newCategory);
    yield* count > 0
      ? logSuccess(
          `Renamed category '${oldCategory}' to '${newCategory}' across ${plural(count, "stack")}`
        )
      : Effect.logWarning(`Category '${oldCategory}' not found on any stacks`);
  });
