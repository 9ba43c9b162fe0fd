// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Sidecar metadata store. Each stack directory may hold a flat YAML
 * mapping of its mutable fields. Reading goes through an explicit schema
 * of known keys: unknown keys are logged and dropped, a `name` key is
 * captured for validation but never applied. Writing rewrites the whole
 * file through a temp file and a rename within the same directory.
 */

import { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Option, Schema, pipe } from "effect";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { ErrorCode, MetadataError, causeOf, errorMessage } from "../lib/errors";
import { decodeWith } from "../lib/schema-utils";
import type { AbsolutePath } from "../lib/types";
import { DEFAULT_METADATA, type Stack, type StackLocation, makeStack } from "./types";

/** Sidecars are YAML 1.1, so `yes`/`no`/`on`/`off` read as booleans. */
const YAML_OPTIONS = { version: "1.1" } as const;

/** Null counts as absent, so `owner:` with no value keeps the default. */
const optionalField = <A, I>(schema: Schema.Schema<A, I, never>) =>
  Schema.optionalWith(schema, { exact: true, nullable: true });

export const SidecarSchema = Schema.Struct({
  name: optionalField(Schema.Union(Schema.String, Schema.Number, Schema.Boolean)),
  description: optionalField(Schema.String),
  category: optionalField(Schema.String),
  subcategory: optionalField(Schema.String),
  tags: optionalField(Schema.Array(Schema.String)),
  auto_start: optionalField(Schema.Boolean),
  priority: optionalField(Schema.Int),
  depends_on: optionalField(Schema.Array(Schema.String)),
  expected_containers: optionalField(Schema.Int.pipe(Schema.nonNegative())),
  critical: optionalField(Schema.Boolean),
  owner: optionalField(Schema.String),
  documentation: optionalField(Schema.String),
  health_check_url: optionalField(Schema.String),
});

export type SidecarRecord = typeof SidecarSchema.Type;

const KNOWN_KEYS: ReadonlySet<string> = new Set(Object.keys(SidecarSchema.fields));

export interface LoadedMetadata {
  /** Whether the sidecar file existed. */
  readonly present: boolean;
  readonly record: SidecarRecord;
}

const absent: LoadedMetadata = { present: false, record: {} };

const isMapping = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseError = (metaFile: AbsolutePath, message: string, e?: unknown): MetadataError =>
  new MetadataError({
    code: ErrorCode.METADATA_PARSE_ERROR,
    message: `Invalid metadata in ${metaFile}: ${message}`,
    path: metaFile,
    ...causeOf(e),
  });

const logUnknownKeys = (
  metaFile: AbsolutePath,
  document: Readonly<Record<string, unknown>>
): Effect.Effect<void> => {
  const unknown = Object.keys(document).filter((key) => !KNOWN_KEYS.has(key));
  return unknown.length === 0
    ? Effect.void
    : Effect.logDebug(`Ignoring unknown metadata keys in ${metaFile}: ${unknown.join(", ")}`);
};

/** Parses and decodes sidecar text; empty and null documents mean "all defaults". */
export const decodeMetadata = (
  metaFile: AbsolutePath,
  content: string
): Effect.Effect<SidecarRecord, MetadataError> =>
  Effect.gen(function* () {
    const document = yield* Effect.try({
      try: (): unknown => parseYaml(content, YAML_OPTIONS),
      catch: (e): MetadataError => parseError(metaFile, errorMessage(e), e),
    });

    if (document === null || document === undefined) {
      return {};
    }
    if (!isMapping(document)) {
      return yield* Effect.fail(parseError(metaFile, "expected a mapping of keys to values"));
    }

    yield* logUnknownKeys(metaFile, document);

    return yield* decodeWith(
      SidecarSchema,
      document,
      (formatted) =>
        new MetadataError({
          code: ErrorCode.METADATA_VALIDATION_ERROR,
          message: `Invalid metadata in ${metaFile}:\n${formatted}`,
          path: metaFile,
        })
    );
  });

export const loadMetadata = (
  metaFile: AbsolutePath
): Effect.Effect<LoadedMetadata, MetadataError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const readError = (e: unknown): MetadataError =>
      new MetadataError({
        code: ErrorCode.METADATA_PARSE_ERROR,
        message: `Failed to read ${metaFile}: ${errorMessage(e)}`,
        path: metaFile,
        ...causeOf(e),
      });

    const exists = yield* Effect.mapError(fs.exists(metaFile), readError);
    if (!exists) {
      return absent;
    }

    const content = yield* Effect.mapError(fs.readFileString(metaFile), readError);
    const record = yield* decodeMetadata(metaFile, content);
    return { present: true, record };
  });

const declaredNameOf = (record: SidecarRecord): Option.Option<string> =>
  pipe(Option.fromNullable(record.name), Option.map(String));

/** Pure merge of decoded sidecar fields over the stack's current values. */
export const applyMetadata = (stack: Stack, loaded: LoadedMetadata): Stack => {
  const r = loaded.record;
  return {
    ...stack,
    description: r.description ?? stack.description,
    category: r.category ?? stack.category,
    subcategory: r.subcategory ?? stack.subcategory,
    tags: r.tags === undefined ? stack.tags : Arr.dedupe(r.tags),
    priority: r.priority ?? stack.priority,
    autoStart: r.auto_start ?? stack.autoStart,
    dependsOn: r.depends_on ?? stack.dependsOn,
    critical: r.critical ?? stack.critical,
    owner: r.owner ?? stack.owner,
    documentation: r.documentation ?? stack.documentation,
    healthCheckUrl: r.health_check_url ?? stack.healthCheckUrl,
    expectedContainers: r.expected_containers ?? stack.expectedContainers,
    hasMetaFile: loaded.present,
    declaredName: declaredNameOf(r),
  };
};

/** Builds a stack from its location and whatever its sidecar holds. */
export const loadStack = (
  location: StackLocation
): Effect.Effect<Stack, MetadataError, FileSystem.FileSystem> =>
  Effect.map(loadMetadata(location.metaFile), (loaded) =>
    applyMetadata(makeStack(location), loaded)
  );

type OptionalEntry = readonly [string, unknown, boolean];

/**
 * Ordered projection written to disk. The first five keys are always
 * present; the rest only when they differ from their defaults.
 */
export const toMetadataRecord = (stack: Stack): Record<string, unknown> => {
  const optional: readonly OptionalEntry[] = [
    ["subcategory", stack.subcategory, stack.subcategory !== DEFAULT_METADATA.subcategory],
    ["depends_on", [...stack.dependsOn], stack.dependsOn.length > 0],
    [
      "expected_containers",
      stack.expectedContainers,
      stack.expectedContainers !== DEFAULT_METADATA.expectedContainers,
    ],
    ["critical", stack.critical, stack.critical],
    ["owner", stack.owner, stack.owner !== ""],
    ["documentation", stack.documentation, stack.documentation !== ""],
    ["health_check_url", stack.healthCheckUrl, stack.healthCheckUrl !== ""],
  ];

  return {
    description: stack.description,
    category: stack.category,
    tags: [...stack.tags],
    auto_start: stack.autoStart,
    priority: stack.priority,
    ...Object.fromEntries(
      optional.filter(([, , include]) => include).map(([key, value]) => [key, value])
    ),
  };
};

export const renderMetadata = (stack: Stack): string =>
  stringifyYaml(toMetadataRecord(stack), { ...YAML_OPTIONS, indent: 2 });

export const saveMetadata = (
  stack: Stack
): Effect.Effect<void, MetadataError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const tempFile = `${stack.metaFile}.tmp`;
    const writeError = (e: unknown): MetadataError =>
      new MetadataError({
        code: ErrorCode.METADATA_WRITE_FAILED,
        message: `Failed to write ${stack.metaFile}: ${errorMessage(e)}`,
        path: stack.metaFile,
        ...causeOf(e),
      });

    yield* pipe(
      fs.writeFileString(tempFile, renderMetadata(stack)),
      Effect.zipRight(fs.rename(tempFile, stack.metaFile)),
      Effect.tapError(() =>
        pipe(
          fs.remove(tempFile),
          Effect.catchAll((e) =>
            Effect.logDebug(`Could not remove ${tempFile}: ${errorMessage(e)}`)
          )
        )
      ),
      Effect.mapError(writeError)
    );
    yield* Effect.logDebug(`Wrote ${stack.metaFile}`);
  });
