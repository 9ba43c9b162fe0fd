// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either } from "effect";
import { describe, expect, test } from "vitest";
import { STOPPED, parseComposePs, parseContainers } from "../../src/compose/status";

const container = (name: string, state: string): string =>
  JSON.stringify({ Name: name, Service: name.split("-")[1], State: state, Health: "" });

describe("parseComposePs", () => {
  test("reads one container object per line", () => {
    const output = [container("app-web-1", "running"), container("app-db-1", "exited"), ""].join("\n");

    expect(Either.getOrThrow(parseComposePs(output))).toEqual({
      state: "running",
      totalContainers: 2,
      runningContainers: 1,
    });
  });

  test("reads a single JSON array", () => {
    const output = `[${container("app-web-1", "running")},${container("app-db-1", "running")}]`;

    expect(Either.getOrThrow(parseComposePs(output))).toEqual({
      state: "running",
      totalContainers: 2,
      runningContainers: 2,
    });
  });

  test("no containers is stopped", () => {
    expect(Either.getOrThrow(parseComposePs(""))).toEqual(STOPPED);
    expect(Either.getOrThrow(parseComposePs("[]\n"))).toEqual(STOPPED);
  });

  test("containers that are all exited are stopped", () => {
    expect(Either.getOrThrow(parseComposePs(container("app-web-1", "exited")))).toEqual({
      state: "stopped",
      totalContainers: 1,
      runningContainers: 0,
    });
  });

  test("unreadable output is a Left", () => {
    expect(Either.isLeft(parseComposePs("not json"))).toBe(true);
    expect(Either.isLeft(parseContainers(`${container("app-web-1", "running")}\n{broken`))).toBe(true);
  });

  test("extra fields are ignored", () => {
    const parsed = parseContainers(container("app-web-1", "running"));
    expect(Either.getOrThrow(parsed)).toEqual([
      { Name: "app-web-1", Service: "web", State: "running" },
    ]);
  });
});
