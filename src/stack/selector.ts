// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Selection of the stacks a command operates on. Every lifecycle command
 * builds one SelectionRequest from its flags and hands it to `resolve`.
 */

import { Data, Effect, Match, Option, pipe } from "effect";
import { ErrorCode, GeneralError, type StackNotFoundError, stackNotFound } from "../lib/errors";
import { displayOrder } from "./order";
import { type Registry, allStacks, byCategory, byName, byTag } from "./registry";
import type { Stack } from "./types";

export type SelectionRequest = Data.TaggedEnum<{
  ByName: { readonly name: string };
  All: object;
  ByCategory: { readonly category: string };
  ByTag: { readonly tag: string };
}>;

export const SelectionRequest = Data.taggedEnum<SelectionRequest>();

export interface SelectionOptions {
  readonly target: Option.Option<string>;
  readonly all: boolean;
  readonly category: Option.Option<string>;
  readonly tag: Option.Option<string>;
}

/** Name beats --all, which beats --category, which beats --tag. */
export const selectionFromOptions = (options: SelectionOptions): Option.Option<SelectionRequest> =>
  pipe(
    Option.map(options.target, (name) => SelectionRequest.ByName({ name })),
    Option.orElse(() => (options.all ? Option.some(SelectionRequest.All()) : Option.none())),
    Option.orElse(() =>
      Option.map(options.category, (category) => SelectionRequest.ByCategory({ category }))
    ),
    Option.orElse(() => Option.map(options.tag, (tag) => SelectionRequest.ByTag({ tag })))
  );

export const MISSING_SELECTION_MESSAGE = "Provide a stack name or use --all, -c, or -t";

export const requireSelection = (
  options: SelectionOptions
): Effect.Effect<SelectionRequest, GeneralError> =>
  Option.match(selectionFromOptions(options), {
    onNone: () =>
      Effect.fail(
        new GeneralError({ code: ErrorCode.INVALID_ARGS, message: MISSING_SELECTION_MESSAGE })
      ),
    onSome: (request) => Effect.succeed(request),
  });

/**
 * An unknown explicit name fails; an empty category or tag match is an
 * empty result. Multi-stack selections come back in display order.
 */
export const resolve = (
  request: SelectionRequest,
  registry: Registry
): Effect.Effect<readonly Stack[], StackNotFoundError> =>
  pipe(
    Match.value(request),
    Match.tag("ByName", ({ name }) =>
      Option.match(byName(registry, name), {
        onNone: (): Effect.Effect<readonly Stack[], StackNotFoundError> =>
          Effect.fail(stackNotFound(name)),
        onSome: (stack): Effect.Effect<readonly Stack[], StackNotFoundError> =>
          Effect.succeed([stack]),
      })
    ),
    Match.tag("All", () => Effect.succeed(displayOrder(allStacks(registry)))),
    Match.tag("ByCategory", ({ category }) =>
      Effect.succeed(displayOrder(byCategory(registry, category)))
    ),
    Match.tag("ByTag", ({ tag }) => Effect.succeed(displayOrder(byTag(registry, tag)))),
    Match.exhaustive
  );

/** Human-readable description for "no stacks" messages. */
export const describeSelection = (request: SelectionRequest): string =>
  pipe(
    Match.value(request),
    Match.tag("ByName", ({ name }) => `stack '${name}'`),
    Match.tag("All", () => "all stacks"),
    Match.tag("ByCategory", ({ category }) => `category '${category}'`),
    Match.tag("ByTag", ({ tag }) => `tag '${tag}'`),
    Match.exhaustive
  );
