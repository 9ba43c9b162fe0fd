// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import { EnvConfigSpec, type TestConfigOverrides, createTestConfigProvider } from "../../src/config/env";
import { defaultGlobalConfig } from "../../src/config/loader";
import { type CliOverrides, resolve, resolveSettings } from "../../src/config/resolve";
import type { GlobalConfig } from "../../src/config/schema";
import { runTest } from "../helpers/layers";

const noCli: CliOverrides = {
  root: Option.none(),
  logLevel: Option.none(),
  logFormat: Option.none(),
  verbose: false,
  json: false,
};

const settingsFor = (
  cli: Partial<CliOverrides>,
  env: TestConfigOverrides = {},
  file: GlobalConfig = defaultGlobalConfig()
) =>
  runTest(
    Effect.gen(function* () {
      const envConfig = yield* EnvConfigSpec;
      return yield* resolveSettings({ ...noCli, ...cli }, envConfig, file);
    }).pipe(Effect.withConfigProvider(createTestConfigProvider(env)))
  );

const withFile = (patch: {
  readonly root?: string;
  readonly level?: GlobalConfig["logging"]["level"];
}): GlobalConfig => {
  const base = defaultGlobalConfig();
  return {
    ...base,
    discovery: patch.root === undefined ? base.discovery : { ...base.discovery, root: patch.root },
    logging: { ...base.logging, level: patch.level ?? base.logging.level },
  };
};

describe("resolve", () => {
  test("CLI beats environment beats file beats fallback", () => {
    expect(
      resolve({ cli: Option.some(1), env: Option.some(2), toml: Option.some(3), fallback: 4 })
    ).toBe(1);
    expect(resolve({ cli: Option.none(), env: Option.some(2), toml: Option.some(3), fallback: 4 })).toBe(2);
    expect(resolve({ cli: Option.none(), env: Option.none(), toml: Option.some(3), fallback: 4 })).toBe(3);
    expect(resolve({ cli: Option.none(), env: Option.none(), toml: Option.none(), fallback: 4 })).toBe(4);
  });
});

describe("resolveSettings", () => {
  test("defaults to the working directory and info level", async () => {
    const settings = await settingsFor({});

    expect(settings.root).toBe(process.cwd());
    expect(settings.logLevel).toBe("info");
    expect(settings.logFormat).toBe("pretty");
    expect(settings.metadataFile).toBe(".stack-meta.yaml");
    expect(settings.composeCommand).toEqual(["docker", "compose"]);
  });

  test("the root comes from CLI, then STACKCTL_ROOT, then the file", async () => {
    const file = withFile({ root: "/srv/from-file" });

    expect((await settingsFor({}, {}, file)).root).toBe("/srv/from-file");
    expect((await settingsFor({}, { root: "/srv/from-env" }, file)).root).toBe("/srv/from-env");
    expect((await settingsFor({ root: Option.some("/srv/from-cli") }, { root: "/srv/from-env" }, file)).root).toBe(
      "/srv/from-cli"
    );
  });

  test("a leading ~ in the root expands to HOME", async () => {
    const settings = await settingsFor({}, { home: "/home/tester", root: "~/stacks" });
    expect(settings.root).toBe("/home/tester/stacks");
  });

  test("--verbose forces debug", async () => {
    const settings = await settingsFor(
      { verbose: true, logLevel: Option.some("error") },
      { logLevel: "warn" }
    );
    expect(settings.logLevel).toBe("debug");
  });

  test("STACKCTL_DEBUG forces debug over STACKCTL_LOG_LEVEL and the file", async () => {
    const settings = await settingsFor({}, { debug: "true", logLevel: "error" }, withFile({ level: "warn" }));
    expect(settings.logLevel).toBe("debug");
  });

  test("--log-level beats STACKCTL_DEBUG", async () => {
    const settings = await settingsFor({ logLevel: Option.some("error") }, { debug: "true" });
    expect(settings.logLevel).toBe("error");
  });

  test("the file level applies when nothing else is set", async () => {
    expect((await settingsFor({}, {}, withFile({ level: "warn" }))).logLevel).toBe("warn");
  });

  test("--json beats --format and the environment", async () => {
    const settings = await settingsFor(
      { json: true, logFormat: Option.some("pretty") },
      { logFormat: "pretty" }
    );
    expect(settings.logFormat).toBe("json");
  });

  test("STACKCTL_LOG_FORMAT applies without CLI flags", async () => {
    expect((await settingsFor({}, { logFormat: "json" })).logFormat).toBe("json");
  });
});
