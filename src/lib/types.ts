// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 * A stack's directory and a user-typed relative path are both strings, but
 * only a resolved `AbsolutePath` may reach the filesystem or the compose
 * executor.
 */

import { Brand } from "effect";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;

/** Nominal constructor; callers are responsible for passing a resolved path. */
export const AbsolutePath: Brand.Brand.Constructor<AbsolutePath> = Brand.nominal<AbsolutePath>();
