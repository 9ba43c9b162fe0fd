// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * In-memory stacks and registries, plus a recording ComposeExecutor
 * stand-in, for tests that never touch docker.
 */

import { Effect, Layer, Stream } from "effect";
import {
  ComposeExecutor,
  type ComposeExecutorValue,
  type LogOptions,
} from "../../src/compose/executor";
import { STOPPED, type StackStatus } from "../../src/compose/status";
import { AbsolutePath } from "../../src/lib/types";
import { type Registry, makeRegistry } from "../../src/stack/registry";
import { type Stack, type StackMetadata, makeStack } from "../../src/stack/types";

export const FIXTURE_ROOT: AbsolutePath = AbsolutePath("/srv/stacks");

export const stackPath = (name: string): AbsolutePath => AbsolutePath(`${FIXTURE_ROOT}/${name}`);

export const fixtureStack = (
  name: string,
  metadata: Partial<StackMetadata & Pick<Stack, "declaredName">> = {}
): Stack => ({
  ...makeStack({
    name,
    path: stackPath(name),
    manifest: AbsolutePath(`${stackPath(name)}/docker-compose.yml`),
    metaFile: AbsolutePath(`${stackPath(name)}/.stack-meta.yaml`),
  }),
  hasMetaFile: true,
  ...metadata,
});

export const fixtureRegistry = (stacks: readonly Stack[]): Registry =>
  makeRegistry(FIXTURE_ROOT, stacks);

export const names = (stacks: readonly Stack[]): readonly string[] => stacks.map((s) => s.name);

export interface FakeComposeOptions {
  /** Stack paths whose `up` fails. */
  readonly failStart?: readonly string[];
  /** Stack paths whose `down` fails. */
  readonly failStop?: readonly string[];
  readonly statuses?: Readonly<Record<string, StackStatus>>;
  readonly logs?: Readonly<Record<string, readonly string[]>>;
}

export interface FakeCompose {
  /** `up <path>` / `down <path>` / `logs <path>` in call order. */
  readonly calls: string[];
  readonly logOptions: LogOptions[];
  readonly layer: Layer.Layer<ComposeExecutor>;
}

export const fakeCompose = (options: FakeComposeOptions = {}): FakeCompose => {
  const calls: string[] = [];
  const logOptions: LogOptions[] = [];
  const value: ComposeExecutorValue = {
    start: (path) =>
      Effect.sync(() => {
        calls.push(`up ${path}`);
        return !(options.failStart ?? []).includes(path);
      }),
    stop: (path) =>
      Effect.sync(() => {
        calls.push(`down ${path}`);
        return !(options.failStop ?? []).includes(path);
      }),
    status: (path) => Effect.succeed(options.statuses?.[path] ?? STOPPED),
    logs: (path, opts) =>
      Stream.suspend(() => {
        calls.push(`logs ${path}`);
        logOptions.push(opts);
        return Stream.fromIterable(options.logs?.[path] ?? []);
      }),
  };
  return { calls, logOptions, layer: Layer.succeed(ComposeExecutor, value) };
};
