// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, Effect, HashMap, LogLevel } from "effect";
import { describe, expect, test } from "vitest";
import { colorize, formatJson, formatPretty, toEffectLogLevel } from "../../src/lib/effect-logger";
import { logFail, logStep, logSuccess } from "../../src/lib/log";
import { captureLogs } from "../helpers/layers";

const noAnnotations = HashMap.empty<string, unknown>();

describe("formatPretty", () => {
  test("plain lines carry a padded level", () => {
    expect(formatPretty(LogLevel.Info, "hello", noAnnotations, Cause.empty, false)).toBe(
      "INFO  hello"
    );
    expect(formatPretty(LogLevel.Warning, "careful", noAnnotations, Cause.empty, false)).toBe(
      "WARN  careful"
    );
  });

  test("a stack annotation prefixes the message", () => {
    const annotations = HashMap.fromIterable<string, unknown>([["stack", "web"]]);
    expect(formatPretty(LogLevel.Error, "boom", annotations, Cause.empty, false)).toBe(
      "ERROR [web] boom"
    );
  });

  test("styled lines", async () => {
    const [, logs] = await Effect.runPromise(
      captureLogs(
        Effect.all([logStep(2, 5, "Starting web"), logSuccess("web started"), logFail("db failed")])
      )
    );
    const rendered = logs.map((l) =>
      formatPretty(LogLevel.Info, l.message, HashMap.fromIterable<string, unknown>(Object.entries(l.annotations)), Cause.empty, false)
    );

    expect(rendered).toEqual(["[2/5] → Starting web", "✓ web started", "✗ db failed"]);
  });

  test("colour wraps text in ANSI codes only when enabled", () => {
    expect(colorize("green", "ok", true)).toBe("\x1b[32mok\x1b[0m");
    expect(colorize("green", "ok", false)).toBe("ok");
  });
});

describe("formatJson", () => {
  test("emits one JSON object with level, message and user annotations", () => {
    const annotations = HashMap.fromIterable<string, unknown>([
      ["stack", "web"],
      ["logStyle", "success"],
      ["requestId", "abc"],
    ]);
    const line = formatJson(LogLevel.Info, "web started", annotations, new Date("2026-01-02T03:04:05.000Z"));

    expect(JSON.parse(line)).toEqual({
      timestamp: "2026-01-02T03:04:05.000Z",
      level: "info",
      stack: "web",
      message: "web started",
      requestId: "abc",
    });
  });
});

describe("toEffectLogLevel", () => {
  test("maps configuration levels", () => {
    expect(toEffectLogLevel("debug")).toBe(LogLevel.Debug);
    expect(toEffectLogLevel("warn")).toBe(LogLevel.Warning);
    expect(toEffectLogLevel("error")).toBe(LogLevel.Error);
  });
});
