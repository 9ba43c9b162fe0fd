// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { FileSystem, Path } from "@effect/platform";
import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { AbsolutePath } from "../../src/lib/types";
import { loadMetadata } from "../../src/stack/metadata";
import {
  addTags,
  allCategories,
  allTags,
  autostartSet,
  byCategory,
  byName,
  byTag,
  categoryUsage,
  collectCandidates,
  discover,
  filterStacks,
  listStacks,
  type Registry,
  removeTags,
  renameCategory,
  renameTag,
  search,
  setCategory,
  tagUsage,
} from "../../src/stack/registry";
import { captureLogs, failureOf, runTest, runTestExit, withTree } from "../helpers/layers";
import { names } from "../helpers/stacks";

const COMPOSE = "services:\n  app:\n    image: example/app:latest\n";

const HOMELAB: Readonly<Record<string, string>> = {
  "media/jellyfin/docker-compose.yml": COMPOSE,
  "media/jellyfin/.stack-meta.yaml":
    "description: Media server\ncategory: media\ntags: [video, streaming]\npriority: 2\nauto_start: true\n",
  "infra/proxy/compose.yaml": COMPOSE,
  "infra/proxy/.stack-meta.yaml":
    "description: Reverse proxy\ncategory: infra\nsubcategory: network\ntags: [core, network]\npriority: 1\nauto_start: true\n",
  "tools/docker-compose.yml": COMPOSE,
  ".hidden/app/docker-compose.yml": COMPOSE,
  "apps/.cache/docker-compose.yml": COMPOSE,
  "notes/README.md": "not a stack\n",
};

/** Discovers a fresh tree, then hands both the root and the registry to `use`. */
const discovered = <A, E>(
  files: Readonly<Record<string, string>>,
  use: (root: AbsolutePath, registry: Registry) => Effect.Effect<A, E, FileSystem.FileSystem | Path.Path>
) =>
  withTree(files, (root) => Effect.flatMap(discover(root), (registry) => use(root, registry)));

/** A two-stack tree whose `db/pgdata` has mode 000 while `use` runs. */
const withUnreadableDataDir = <A, E>(
  use: (root: AbsolutePath) => Effect.Effect<A, E, FileSystem.FileSystem | Path.Path>
) =>
  withTree(
    {
      "web/docker-compose.yml": COMPOSE,
      "db/docker-compose.yml": COMPOSE,
      "db/pgdata/PG_VERSION": "16\n",
      "db/.cache/blob": "x",
    },
    (root) =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const dataDir = `${root}/db/pgdata`;
        yield* fs.chmod(dataDir, 0o000);
        yield* fs.chmod(`${root}/db/.cache`, 0o000);
        return yield* Effect.ensuring(
          use(root),
          Effect.orDie(
            Effect.zipRight(fs.chmod(dataDir, 0o755), fs.chmod(`${root}/db/.cache`, 0o755))
          )
        );
      })
  );

describe("discover", () => {
  test("finds one stack per manifest directory and skips hidden directories", async () => {
    const result = await runTest(
      discovered(HOMELAB, (root, registry) =>
        Effect.succeed({ root, names: [...registry.stacks.keys()].sort(), registry })
      )
    );

    expect(result.names).toEqual(["infra-proxy", "media-jellyfin", "tools"]);
  });

  test("records paths and applies sidecar metadata", async () => {
    const { root, registry } = await runTest(
      discovered(HOMELAB, (root, registry) => Effect.succeed({ root, registry }))
    );

    const proxy = Option.getOrThrow(byName(registry, "infra-proxy"));
    expect(proxy.path).toBe(`${root}/infra/proxy`);
    expect(proxy.manifest).toBe(`${root}/infra/proxy/compose.yaml`);
    expect(proxy.metaFile).toBe(`${root}/infra/proxy/.stack-meta.yaml`);
    expect(proxy.category).toBe("infra");
    expect(proxy.subcategory).toBe("network");
    expect(proxy.priority).toBe(1);
    expect(proxy.hasMetaFile).toBe(true);

    const tools = Option.getOrThrow(byName(registry, "tools"));
    expect(tools.category).toBe("uncategorized");
    expect(tools.priority).toBe(5);
    expect(tools.hasMetaFile).toBe(false);
  });

  test("prefers docker-compose.yml when a directory holds several manifests", async () => {
    const registry = await runTest(
      withTree(
        { "app/compose.yaml": COMPOSE, "app/docker-compose.yml": COMPOSE },
        (root) => discover(root)
      )
    );
    const app = Option.getOrThrow(byName(registry, "app"));
    expect(app.manifest.endsWith("/app/docker-compose.yml")).toBe(true);
  });

  test("honours custom manifest names", async () => {
    const registry = await runTest(
      withTree(
        { "a/stack.yml": COMPOSE, "b/docker-compose.yml": COMPOSE },
        (root) => discover(root, { manifestNames: ["stack.yml"] })
      )
    );
    expect([...registry.stacks.keys()]).toEqual(["a"]);
  });

  test("a manifest at the root takes the root directory's name", async () => {
    const result = await runTest(
      withTree({ "docker-compose.yml": COMPOSE, "sub/docker-compose.yml": COMPOSE }, (root) =>
        Effect.map(discover(root), (registry) => ({ root, registry }))
      )
    );
    const rootName = result.root.slice(result.root.lastIndexOf("/") + 1);

    expect([...result.registry.stacks.keys()].sort()).toEqual([rootName, "sub"].sort());
    expect(Option.getOrThrow(byName(result.registry, rootName)).path).toBe(result.root);
  });

  test("name collisions keep the later directory and log a warning", async () => {
    const [result, logs] = await runTest(
      captureLogs(
        withTree({ "a-b/docker-compose.yml": COMPOSE, "a/b/docker-compose.yml": COMPOSE }, (root) =>
          Effect.map(discover(root), (registry) => ({ root, registry }))
        )
      )
    );
    const { root, registry } = result;

    expect(registry.stacks.size).toBe(1);
    expect(Option.getOrThrow(byName(registry, "a-b")).path).toBe(`${root}/a/b`);
    expect(logs.filter((l) => l.level === "WARN").map((l) => l.message)).toEqual([
      `Stack name 'a-b' is derived from both ${root}/a-b and ${root}/a/b; using ${root}/a/b`,
    ]);
  });

  test("a missing root fails with a directory read error naming the cause", async () => {
    const exit = await runTestExit(discover(AbsolutePath("/nonexistent/stackctl-root")));
    const error = failureOf(exit);
    expect(Option.getOrUndefined(error)).toMatchObject({
      _tag: "SystemError",
      code: ErrorCode.DIRECTORY_READ_FAILED,
    });
    const message = Option.match(error, { onNone: () => "", onSome: (e) => e.message });
    expect(message.startsWith("Cannot read stack root /nonexistent/stackctl-root: ")).toBe(true);
    expect(message).toContain("ENOENT");
  });

  test("discovering the same tree twice yields the same stacks", async () => {
    const [first, second] = await runTest(
      withTree(HOMELAB, (root) => Effect.all([discover(root), discover(root)]))
    );
    expect([...second.stacks.keys()].sort()).toEqual([...first.stacks.keys()].sort());
    const plain = (registry: Registry) =>
      [...registry.stacks.values()].map((s) => ({
        ...s,
        declaredName: Option.getOrUndefined(s.declaredName),
      }));
    expect(plain(second)).toEqual(plain(first));
  });

  test("an unreadable subdirectory does not stop discovery", async () => {
    const registry = await runTest(withUnreadableDataDir((root) => discover(root)));
    expect([...registry.stacks.keys()].sort()).toEqual(["db", "web"]);
  });

  test.skipIf(process.getuid?.() === 0)(
    "an unreadable subdirectory is reported as a warning",
    async () => {
      const [result, logs] = await runTest(
        captureLogs(
          withUnreadableDataDir((root) => Effect.map(discover(root), () => root))
        )
      );
      expect(logs.filter((l) => l.level === "WARN").map((l) => l.message)).toEqual([
        expect.stringMatching(
          new RegExp(`^Skipping unreadable directory ${result}/db/pgdata: .*EACCES`)
        ),
      ]);
    }
  );

  test("a root that is a file fails with a directory read error", async () => {
    const exit = await runTestExit(
      withTree({ "file.txt": "x" }, (root) => discover(AbsolutePath(`${root}/file.txt`)))
    );
    expect(Option.getOrUndefined(failureOf(exit))).toMatchObject({
      _tag: "SystemError",
      code: ErrorCode.DIRECTORY_READ_FAILED,
    });
  });

  test("an invalid sidecar fails discovery", async () => {
    const exit = await runTestExit(
      withTree(
        { "app/docker-compose.yml": COMPOSE, "app/.stack-meta.yaml": "priority: [1, 2]\n" },
        (root) => discover(root)
      )
    );
    expect(Option.getOrUndefined(failureOf(exit))).toMatchObject({
      _tag: "MetadataError",
      code: ErrorCode.METADATA_VALIDATION_ERROR,
    });
  });
});

describe("collectCandidates", () => {
  test("groups by directory and sorts by relative directory", async () => {
    const candidates = await runTest(
      Effect.map(Path.Path, (path) =>
        collectCandidates(
          [
            "z/compose.yml",
            "a/docker-compose.yaml",
            "a/compose.yml",
            "a/notes.txt",
            "a/.git/docker-compose.yml",
            "docker-compose.yml",
          ],
          ["docker-compose.yml", "docker-compose.yaml", "compose.yml", "compose.yaml"],
          path
        )
      )
    );

    expect(candidates).toEqual([
      { relDir: "", manifestName: "docker-compose.yml" },
      { relDir: "a", manifestName: "docker-compose.yaml" },
      { relDir: "z", manifestName: "compose.yml" },
    ]);
  });
});

describe("queries", () => {
  const withHomelab = <A>(query: (registry: Registry) => A) =>
    runTest(withTree(HOMELAB, (root) => Effect.map(discover(root), query)));

  test("byCategory and byTag", async () => {
    expect(names(await withHomelab((r) => byCategory(r, "media")))).toEqual(["media-jellyfin"]);
    expect(names(await withHomelab((r) => byTag(r, "core")))).toEqual(["infra-proxy"]);
    expect(await withHomelab((r) => byTag(r, "missing"))).toEqual([]);
  });

  test("search matches name, description and tags case-insensitively", async () => {
    expect(names(await withHomelab((r) => search(r, "JELLY")))).toEqual(["media-jellyfin"]);
    expect(names(await withHomelab((r) => search(r, "reverse")))).toEqual(["infra-proxy"]);
    expect(names(await withHomelab((r) => search(r, "stream")))).toEqual(["media-jellyfin"]);
  });

  test("autostartSet is in start order", async () => {
    expect(names(await withHomelab(autostartSet))).toEqual(["infra-proxy", "media-jellyfin"]);
  });

  test("listStacks is in display order", async () => {
    expect(names(await withHomelab(listStacks))).toEqual(["infra-proxy", "media-jellyfin", "tools"]);
  });

  test("filterStacks combines category and tag", async () => {
    const filtered = await withHomelab((r) =>
      filterStacks(r, { category: Option.some("media"), tag: Option.some("core") })
    );
    expect(filtered).toEqual([]);

    const byTagOnly = await withHomelab((r) =>
      filterStacks(r, { category: Option.none(), tag: Option.some("video") })
    );
    expect(names(byTagOnly)).toEqual(["media-jellyfin"]);
  });

  test("tags and categories with usage counts", async () => {
    expect(await withHomelab(allTags)).toEqual(["core", "network", "streaming", "video"]);
    expect(await withHomelab(allCategories)).toEqual([
      { category: "infra", subcategory: "network" },
      { category: "media", subcategory: "" },
      { category: "uncategorized", subcategory: "" },
    ]);
    expect(await withHomelab((r) => tagUsage(r, "video"))).toBe(1);
    expect(await withHomelab((r) => categoryUsage(r, "infra", "network"))).toBe(1);
    expect(await withHomelab((r) => categoryUsage(r, "infra", ""))).toBe(0);
  });
});

describe("mutations", () => {
  test("addTags persists only new tags and creates the sidecar", async () => {
    const result = await runTest(
      discovered(HOMELAB, (root, registry) =>
        Effect.gen(function* () {
          const fs = yield* FileSystem.FileSystem;
          const added = yield* addTags(registry, "tools", ["db", "db", "util"]);
          const again = yield* addTags(registry, "tools", ["util"]);
          const onDisk = yield* loadMetadata(AbsolutePath(`${root}/tools/.stack-meta.yaml`));
          const manifest = yield* fs.readFileString(`${root}/tools/docker-compose.yml`);
          return { added, again, onDisk, manifest, tools: Option.getOrThrow(byName(registry, "tools")) };
        })
      )
    );

    expect(result.added).toEqual(["db", "util"]);
    expect(result.again).toEqual([]);
    expect(result.onDisk.record.tags).toEqual(["db", "util"]);
    expect(result.tools.tags).toEqual(["db", "util"]);
    expect(result.tools.hasMetaFile).toBe(true);
    expect(result.manifest).toBe(COMPOSE);
  });

  test("a no-op addTags does not create a sidecar", async () => {
    const exists = await runTest(
      discovered(HOMELAB, (root, registry) =>
        Effect.gen(function* () {
          const fs = yield* FileSystem.FileSystem;
          yield* addTags(registry, "tools", []);
          return yield* fs.exists(`${root}/tools/.stack-meta.yaml`);
        })
      )
    );
    expect(exists).toBe(false);
  });

  test("removeTags returns only the tags that were present", async () => {
    const result = await runTest(
      discovered(HOMELAB, (root, registry) =>
        Effect.gen(function* () {
          const removed = yield* removeTags(registry, "media-jellyfin", ["video", "absent"]);
          const onDisk = yield* loadMetadata(AbsolutePath(`${root}/media/jellyfin/.stack-meta.yaml`));
          return { removed, tags: onDisk.record.tags };
        })
      )
    );
    expect(result.removed).toEqual(["video"]);
    expect(result.tags).toEqual(["streaming"]);
  });

  test("mutating an unknown stack fails", async () => {
    const exit = await runTestExit(
      discovered(HOMELAB, (_root, registry) => addTags(registry, "ghost", ["x"]))
    );
    expect(Option.getOrUndefined(failureOf(exit))).toMatchObject({
      _tag: "StackNotFoundError",
      stackName: "ghost",
    });
  });

  test("renameTag touches every carrier and never duplicates the new tag", async () => {
    const result = await runTest(
      discovered(
        {
          "a/docker-compose.yml": COMPOSE,
          "a/.stack-meta.yaml": "tags: [web, prod]\n",
          "b/docker-compose.yml": COMPOSE,
          "b/.stack-meta.yaml": "tags: [web, frontend]\n",
          "c/docker-compose.yml": COMPOSE,
          "c/.stack-meta.yaml": "tags: [db]\n",
        },
        (root, registry) =>
          Effect.gen(function* () {
            const count = yield* renameTag(registry, "web", "frontend");
            const reloaded = yield* discover(root);
            return {
              count,
              a: Option.getOrThrow(byName(reloaded, "a")).tags,
              b: Option.getOrThrow(byName(reloaded, "b")).tags,
              c: Option.getOrThrow(byName(reloaded, "c")).tags,
              missing: yield* renameTag(registry, "nope", "x"),
            };
          })
      )
    );

    expect(result.count).toBe(2);
    expect(result.a).toEqual(["prod", "frontend"]);
    expect(result.b).toEqual(["frontend"]);
    expect(result.c).toEqual(["db"]);
    expect(result.missing).toBe(0);
  });

  test("renameCategory rewrites every stack in the category", async () => {
    const result = await runTest(
      discovered(HOMELAB, (root, registry) =>
        Effect.gen(function* () {
          const count = yield* renameCategory(registry, "infra", "platform");
          const reloaded = yield* discover(root);
          return { count, proxy: Option.getOrThrow(byName(reloaded, "infra-proxy")) };
        })
      )
    );
    expect(result.count).toBe(1);
    expect(result.proxy.category).toBe("platform");
    expect(result.proxy.subcategory).toBe("network");
  });

  test("setCategory reports the previous and new labels", async () => {
    const result = await runTest(
      discovered(HOMELAB, (root, registry) =>
        Effect.gen(function* () {
          const change = yield* setCategory(registry, "tools", "utilities", "cli");
          const onDisk = yield* loadMetadata(AbsolutePath(`${root}/tools/.stack-meta.yaml`));
          return { change, onDisk };
        })
      )
    );
    expect(result.change).toEqual({ previous: "uncategorized", current: "utilities/cli" });
    expect(result.onDisk.record.category).toBe("utilities");
    expect(result.onDisk.record.subcategory).toBe("cli");
  });
});
