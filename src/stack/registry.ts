// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stack registry. `discover` walks a root directory once and builds the
 * name -> stack map; queries are pure reads over that map, and mutations
 * persist every touched stack through the metadata store before
 * replacing its entry.
 */

import { FileSystem, Path } from "@effect/platform";
import { Array as Arr, Effect, Option, Order } from "effect";
import {
  ErrorCode,
  type MetadataError,
  type StackNotFoundError,
  SystemError,
  causeOf,
  errorMessage,
  stackNotFound,
} from "../lib/errors";
import { AbsolutePath } from "../lib/types";
import { MANIFEST_NAMES_DEFAULT, METADATA_FILE_DEFAULT } from "../config/field-values";
import { loadStack, saveMetadata } from "./metadata";
import { displayOrder, startOrder } from "./order";
import { type Stack, type StackLocation, categoryLabel } from "./types";

export interface Registry {
  readonly root: AbsolutePath;
  readonly stacks: Map<string, Stack>;
}

export interface DiscoverOptions {
  /** Manifest file names in order of preference. */
  readonly manifestNames?: readonly string[];
  readonly metadataFile?: string;
}

/** Joins relative directory segments into a stack name. */
export const NAME_SEPARATOR = "-";

export const makeRegistry = (root: AbsolutePath, stacks: Iterable<Stack> = []): Registry => ({
  root,
  stacks: new Map(Arr.map(Arr.fromIterable(stacks), (s) => [s.name, s] as const)),
});

const isHidden = (segment: string): boolean => segment.startsWith(".");

interface Candidate {
  readonly relDir: string;
  readonly manifestName: string;
}

/**
 * Groups manifest paths (relative to the root) by directory, keeping the
 * most preferred manifest name per directory, sorted by directory.
 */
export const collectCandidates = (
  entries: readonly string[],
  manifestNames: readonly string[],
  path: Path.Path
): readonly Candidate[] => {
  const preference = (name: string): number => manifestNames.indexOf(name);

  const byDir = new Map<string, string>();
  for (const entry of entries) {
    const manifestName = path.basename(entry);
    const relDir = path.dirname(entry) === "." ? "" : path.dirname(entry);
    const segments = relDir === "" ? [] : relDir.split(path.sep);
    if (preference(manifestName) < 0 || segments.some(isHidden)) {
      continue;
    }
    const current = byDir.get(relDir);
    if (current === undefined || preference(manifestName) < preference(current)) {
      byDir.set(relDir, manifestName);
    }
  }

  const candidates = Arr.map(
    Arr.fromIterable(byDir.entries()),
    ([relDir, manifestName]): Candidate => ({ relDir, manifestName })
  );
  return Arr.sort(candidates, Order.mapInput(Order.string, (c: Candidate) => c.relDir));
};

/** The root's own manifest takes the root directory's name. */
export const deriveName = (root: AbsolutePath, relDir: string, path: Path.Path): string =>
  relDir === "" ? path.basename(root) : relDir.split(path.sep).join(NAME_SEPARATOR);

const readError = (root: AbsolutePath, e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.DIRECTORY_READ_FAILED,
    message: `Cannot read stack root ${root}: ${errorMessage(e)}`,
    ...causeOf(e),
  });

const locate = (
  root: AbsolutePath,
  candidate: Candidate,
  metadataFile: string,
  path: Path.Path
): StackLocation => {
  const dir = path.join(root, candidate.relDir);
  return {
    name: deriveName(root, candidate.relDir, path),
    path: AbsolutePath(dir),
    manifest: AbsolutePath(path.join(dir, candidate.manifestName)),
    metaFile: AbsolutePath(path.join(dir, metadataFile)),
  };
};

/**
 * Manifest files under `root`, relative to it. Hidden directories are not
 * entered, symlinked directories are visited once, and a subdirectory that
 * cannot be read is skipped with a warning. Only the root itself is fatal.
 */
export const walkTree = (
  root: AbsolutePath,
  manifestNames: readonly string[]
): Effect.Effect<readonly string[], SystemError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const visited = new Set<string>();
    const found: string[] = [];

    const visit = (relDir: string): Effect.Effect<void, SystemError> =>
      Effect.gen(function* () {
        const dir = path.join(root, relDir);
        const real = yield* Effect.orElseSucceed(fs.realPath(dir), () => dir);
        if (visited.has(real)) {
          return;
        }
        visited.add(real);

        const listing = fs.readDirectory(dir);
        const names =
          relDir === ""
            ? yield* Effect.mapError(listing, (e) => readError(root, e))
            : yield* Effect.catchAll(listing, (e) =>
                Effect.as(
                  Effect.logWarning(`Skipping unreadable directory ${dir}: ${errorMessage(e)}`),
                  []
                )
              );

        for (const name of Arr.sort(names, Order.string)) {
          if (isHidden(name)) {
            continue;
          }
          const rel = relDir === "" ? name : path.join(relDir, name);
          const info = yield* Effect.option(fs.stat(path.join(root, rel)));
          if (Option.isNone(info)) {
            yield* Effect.logDebug(`Skipping ${path.join(root, rel)}: cannot stat`);
            continue;
          }
          if (info.value.type === "Directory") {
            yield* visit(rel);
          } else if (info.value.type === "File" && manifestNames.includes(name)) {
            found.push(rel);
          }
        }
      });

    yield* visit("");
    return found;
  });

/**
 * Builds a registry from the filesystem as it is now. Candidates are
 * visited in directory order, so when two directories derive the same
 * name the later one replaces the earlier one, with a warning.
 */
export const discover = (
  root: AbsolutePath,
  options: DiscoverOptions = {}
): Effect.Effect<Registry, SystemError | MetadataError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const manifestNames = options.manifestNames ?? MANIFEST_NAMES_DEFAULT;
    const metadataFile = options.metadataFile ?? METADATA_FILE_DEFAULT;

    const info = yield* Effect.mapError(fs.stat(root), (e) => readError(root, e));
    if (info.type !== "Directory") {
      return yield* Effect.fail(readError(root, "not a directory"));
    }

    const entries = yield* walkTree(root, manifestNames);
    const candidates = collectCandidates(entries, manifestNames, path);
    yield* Effect.logDebug(`Found ${candidates.length} manifest(s) under ${root}`);

    const registry = makeRegistry(root);
    for (const candidate of candidates) {
      const stack = yield* loadStack(locate(root, candidate, metadataFile, path));
      const previous = registry.stacks.get(stack.name);
      if (previous !== undefined) {
        yield* Effect.logWarning(
          `Stack name '${stack.name}' is derived from both ${previous.path} and ${stack.path}; using ${stack.path}`
        );
      }
      registry.stacks.set(stack.name, stack);
    }
    return registry;
  });

// ============================================================================
// Queries
// ============================================================================

export const byName = (registry: Registry, name: string): Option.Option<Stack> =>
  Option.fromNullable(registry.stacks.get(name));

/** Map iteration order; callers sort. */
export const allStacks = (registry: Registry): readonly Stack[] =>
  Arr.fromIterable(registry.stacks.values());

/** Exact match on category; subcategory is not considered. */
export const byCategory = (registry: Registry, category: string): readonly Stack[] =>
  Arr.filter(allStacks(registry), (s) => s.category === category);

export const byTag = (registry: Registry, tag: string): readonly Stack[] =>
  Arr.filter(allStacks(registry), (s) => s.tags.includes(tag));

/** Case-insensitive substring match on name, description or any tag. */
export const search = (registry: Registry, term: string): readonly Stack[] => {
  const needle = term.toLowerCase();
  const matches = (text: string): boolean => text.toLowerCase().includes(needle);
  return Arr.filter(
    allStacks(registry),
    (s) => matches(s.name) || matches(s.description) || s.tags.some(matches)
  );
};

/** Stacks flagged for auto-start, in start order. */
export const autostartSet = (registry: Registry): readonly Stack[] =>
  startOrder(Arr.filter(allStacks(registry), (s) => s.autoStart));

export const allTags = (registry: Registry): readonly string[] =>
  Arr.sort(Arr.dedupe(Arr.flatMap(allStacks(registry), (s) => s.tags)), Order.string);

export interface CategoryPair {
  readonly category: string;
  readonly subcategory: string;
}

const CategoryPairOrder: Order.Order<CategoryPair> = Order.combine(
  Order.mapInput(Order.string, (p: CategoryPair) => p.category),
  Order.mapInput(Order.string, (p: CategoryPair) => p.subcategory)
);

export const allCategories = (registry: Registry): readonly CategoryPair[] => {
  const pairs = Arr.map(
    allStacks(registry),
    (s): CategoryPair => ({ category: s.category, subcategory: s.subcategory })
  );
  const unique = Arr.dedupeWith(
    pairs,
    (a, b) => a.category === b.category && a.subcategory === b.subcategory
  );
  return Arr.sort(unique, CategoryPairOrder);
};

/** Every stack in display order. */
export const listStacks = (registry: Registry): readonly Stack[] =>
  displayOrder(allStacks(registry));

export interface StackFilter {
  readonly category: Option.Option<string>;
  readonly tag: Option.Option<string>;
}

/** Category AND tag filter, each optional, in display order. */
export const filterStacks = (registry: Registry, filter: StackFilter): readonly Stack[] =>
  displayOrder(
    Arr.filter(
      allStacks(registry),
      (s) =>
        Option.match(filter.category, { onNone: () => true, onSome: (c) => s.category === c }) &&
        Option.match(filter.tag, { onNone: () => true, onSome: (t) => s.tags.includes(t) })
    )
  );

export const tagUsage = (registry: Registry, tag: string): number => byTag(registry, tag).length;

export const categoryUsage = (registry: Registry, category: string, subcategory: string): number =>
  Arr.filter(allStacks(registry), (s) => s.category === category && s.subcategory === subcategory)
    .length;

// ============================================================================
// Mutations
// ============================================================================

const persist = (
  registry: Registry,
  stack: Stack
): Effect.Effect<Stack, MetadataError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* saveMetadata(stack);
    const saved: Stack = { ...stack, hasMetaFile: true };
    registry.stacks.set(saved.name, saved);
    return saved;
  });

const requireStack = (registry: Registry, name: string): Effect.Effect<Stack, StackNotFoundError> =>
  Option.match(byName(registry, name), {
    onNone: () => Effect.fail(stackNotFound(name)),
    onSome: Effect.succeed,
  });

/** Applies `update` to every stack it returns Some for, persisting each. */
const updateWhere = (
  registry: Registry,
  update: (stack: Stack) => Option.Option<Stack>
): Effect.Effect<number, MetadataError, FileSystem.FileSystem> =>
  Effect.map(
    Effect.forEach(Arr.filterMap(allStacks(registry), update), (stack) => persist(registry, stack)),
    (touched) => touched.length
  );

/**
 * Replaces `oldTag` with `newTag` on every stack carrying it. `newTag` is
 * appended only when absent, so a stack never ends up with it twice.
 */
export const renameTag = (
  registry: Registry,
  oldTag: string,
  newTag: string
): Effect.Effect<number, MetadataError, FileSystem.FileSystem> =>
  updateWhere(registry, (stack) => {
    if (!stack.tags.includes(oldTag)) {
      return Option.none();
    }
    const remaining = stack.tags.filter((t) => t !== oldTag);
    const tags = remaining.includes(newTag) ? remaining : [...remaining, newTag];
    return Option.some({ ...stack, tags });
  });

/** Subcategories are left as they are. */
export const renameCategory = (
  registry: Registry,
  oldCategory: string,
  newCategory: string
): Effect.Effect<number, MetadataError, FileSystem.FileSystem> =>
  updateWhere(registry, (stack) =>
    stack.category === oldCategory ? Option.some({ ...stack, category: newCategory }) : Option.none()
  );

/** Returns the tags that were not already present. */
export const addTags = (
  registry: Registry,
  name: string,
  tags: readonly string[]
): Effect.Effect<readonly string[], StackNotFoundError | MetadataError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const stack = yield* requireStack(registry, name);
    const added = Arr.dedupe(tags.filter((t) => !stack.tags.includes(t)));
    if (added.length > 0) {
      yield* persist(registry, { ...stack, tags: [...stack.tags, ...added] });
    }
    return added;
  });

/** Returns the tags that were present and are now gone. */
export const removeTags = (
  registry: Registry,
  name: string,
  tags: readonly string[]
): Effect.Effect<readonly string[], StackNotFoundError | MetadataError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const stack = yield* requireStack(registry, name);
    const removed = Arr.dedupe(tags.filter((t) => stack.tags.includes(t)));
    if (removed.length > 0) {
      yield* persist(registry, {
        ...stack,
        tags: stack.tags.filter((t) => !removed.includes(t)),
      });
    }
    return removed;
  });

export interface CategoryChange {
  readonly previous: string;
  readonly current: string;
}

export const setCategory = (
  registry: Registry,
  name: string,
  category: string,
  subcategory = ""
): Effect.Effect<CategoryChange, StackNotFoundError | MetadataError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const stack = yield* requireStack(registry, name);
    const change: CategoryChange = {
      previous: categoryLabel(stack.category, stack.subcategory),
      current: categoryLabel(category, subcategory),
    };
    if (stack.category !== category || stack.subcategory !== subcategory) {
      yield* persist(registry, { ...stack, category, subcategory });
    }
    return change;
  });
