// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { causeOf, errorMessage, toExitCode } from "../../src/lib/errors";

describe("errorMessage", () => {
  test("reads Error instances and strings", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });

  test("reads the message of error-like objects", () => {
    const platformLike = { _tag: "SystemError", reason: "NotFound", message: "ENOENT: no such file" };
    expect(errorMessage(platformLike)).toBe("ENOENT: no such file");
  });

  test("falls back to String for anything else", () => {
    expect(errorMessage(42)).toBe("42");
    expect(errorMessage({ message: 42 })).toBe("[object Object]");
  });
});

describe("causeOf", () => {
  test("keeps Error instances as they are", () => {
    const error = new Error("boom");
    expect(causeOf(error).cause).toBe(error);
  });

  test("wraps error-like objects, keeping the original as the cause", () => {
    const platformLike = { _tag: "SystemError", message: "EACCES: permission denied" };
    const { cause } = causeOf(platformLike);
    expect(cause?.message).toBe("EACCES: permission denied");
    expect(cause?.cause).toBe(platformLike);
  });

  test("attaches nothing for other values", () => {
    expect(causeOf("text")).toEqual({});
  });
});

describe("toExitCode", () => {
  test("caps at 125", () => {
    expect(toExitCode(30)).toBe(30);
    expect(toExitCode(200)).toBe(125);
  });
});
