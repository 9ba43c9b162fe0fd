// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Chunk, Effect, Option, Stream } from "effect";
import { describe, expect, test } from "vitest";
import { DEFAULT_LOG_OPTIONS } from "../../src/compose/executor";
import {
  collectStatuses,
  healthOf,
  logLines,
  restartStacks,
  startStacks,
  stopStacks,
} from "../../src/stack/orchestrator";
import { captureLogs } from "../helpers/layers";
import { fakeCompose, fixtureStack, names, stackPath } from "../helpers/stacks";

const web = fixtureStack("web");
const db = fixtureStack("db");
const cache = fixtureStack("cache");

describe("batches", () => {
  test("start runs every stack in order and reports failures without aborting", async () => {
    const compose = fakeCompose({ failStart: [stackPath("db")] });
    const [report, logs] = await Effect.runPromise(
      captureLogs(startStacks([web, db, cache]).pipe(Effect.provide(compose.layer)))
    );

    expect(compose.calls).toEqual([
      `up ${stackPath("web")}`,
      `up ${stackPath("db")}`,
      `up ${stackPath("cache")}`,
    ]);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(1);
    expect(report.results.map((r) => [r.stack.name, r.ok])).toEqual([
      ["web", true],
      ["db", false],
      ["cache", true],
    ]);
    expect(logs.map((l) => l.message)).toEqual([
      "Starting web",
      "web started",
      "Starting db",
      "db: starting failed",
      "Starting cache",
      "cache started",
    ]);
    expect(logs[2]?.annotations).toMatchObject({
      logStyle: "step",
      stepNumber: "2",
      stepTotal: "3",
    });
    expect(logs[3]?.annotations).toMatchObject({ logStyle: "fail" });
  });

  test("stop issues down for each stack", async () => {
    const compose = fakeCompose();
    const report = await Effect.runPromise(
      stopStacks([cache, web]).pipe(Effect.provide(compose.layer))
    );

    expect(compose.calls).toEqual([`down ${stackPath("cache")}`, `down ${stackPath("web")}`]);
    expect(report.failed).toBe(0);
  });

  test("restart skips the start when the stop failed", async () => {
    const compose = fakeCompose({ failStop: [stackPath("web")] });
    const report = await Effect.runPromise(
      restartStacks([web, db]).pipe(Effect.provide(compose.layer))
    );

    expect(compose.calls).toEqual([
      `down ${stackPath("web")}`,
      `down ${stackPath("db")}`,
      `up ${stackPath("db")}`,
    ]);
    expect(report.results.map((r) => r.ok)).toEqual([false, true]);
  });

  test("an empty batch does nothing", async () => {
    const compose = fakeCompose();
    const report = await Effect.runPromise(startStacks([]).pipe(Effect.provide(compose.layer)));

    expect(compose.calls).toEqual([]);
    expect(report).toEqual({ results: [], succeeded: 0, failed: 0 });
  });
});

describe("status", () => {
  test("degraded means running with fewer containers than expected", () => {
    const expecting = fixtureStack("app", { expectedContainers: 3 });
    expect(healthOf(expecting, { state: "running", totalContainers: 3, runningContainers: 2 })).toBe(
      "degraded"
    );
    expect(healthOf(expecting, { state: "running", totalContainers: 3, runningContainers: 3 })).toBe(
      "running"
    );
    expect(healthOf(web, { state: "running", totalContainers: 5, runningContainers: 1 })).toBe(
      "running"
    );
    expect(healthOf(expecting, { state: "stopped", totalContainers: 3, runningContainers: 0 })).toBe(
      "stopped"
    );
  });

  test("collectStatuses keeps input order and summarizes", async () => {
    const app = fixtureStack("app", { expectedContainers: 3 });
    const compose = fakeCompose({
      statuses: {
        [stackPath("app")]: { state: "running", totalContainers: 3, runningContainers: 2 },
        [stackPath("web")]: { state: "running", totalContainers: 1, runningContainers: 1 },
      },
    });
    const report = await Effect.runPromise(
      collectStatuses([app, web, db]).pipe(Effect.provide(compose.layer))
    );

    expect(names(report.entries.map((e) => e.stack))).toEqual(["app", "web", "db"]);
    expect(report.entries.map((e) => e.health)).toEqual(["degraded", "running", "stopped"]);
    expect(report.summary).toEqual({ total: 3, running: 1, stopped: 1, degraded: 1 });
  });
});

describe("logLines", () => {
  const collect = (stacks: Parameters<typeof logLines>[0], follow: boolean) => {
    const compose = fakeCompose({
      logs: {
        [stackPath("web")]: ["GET /", "GET /health"],
        [stackPath("db")]: ["ready"],
      },
    });
    return Effect.runPromise(
      Stream.runCollect(logLines(stacks, { ...DEFAULT_LOG_OPTIONS, follow })).pipe(
        Effect.map(Chunk.toReadonlyArray),
        Effect.provide(compose.layer)
      )
    );
  };

  test("a single stack streams unprefixed lines", async () => {
    expect(await collect([web], false)).toEqual(["GET /", "GET /health"]);
  });

  test("several stacks without follow run one after another with prefixes", async () => {
    expect(await collect([web, db], false)).toEqual([
      "[web] GET /",
      "[web] GET /health",
      "[db] ready",
    ]);
  });

  test("several stacks with follow merge every prefixed line", async () => {
    const lines = await collect([web, db], true);
    expect([...lines].sort()).toEqual(["[db] ready", "[web] GET /", "[web] GET /health"]);
    expect(lines.indexOf("[web] GET /")).toBeLessThan(lines.indexOf("[web] GET /health"));
  });

  test("no stacks means no lines", async () => {
    expect(await collect([], true)).toEqual([]);
  });

  test("log options reach the executor unchanged", async () => {
    const compose = fakeCompose();
    const options = { ...DEFAULT_LOG_OPTIONS, tail: Option.some("50"), timestamps: true };
    await Effect.runPromise(
      Stream.runDrain(logLines([web], options)).pipe(Effect.provide(compose.layer))
    );
    expect(compose.logOptions).toEqual([options]);
  });
});
