// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema for stackctl.toml, the single source of truth for the
 * global configuration file. Every section is optional and fills in
 * defaults, so an empty document decodes to the default configuration.
 */

import { Schema } from "effect";
import {
  COMPOSE_COMMAND_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  MANIFEST_NAMES_DEFAULT,
  METADATA_FILE_DEFAULT,
} from "./field-values";

const fileNameMessage = (): string => "File names must not contain path separators";

const FileNameSchema = Schema.NonEmptyString.pipe(
  Schema.filter((s) => !s.includes("/"), { message: fileNameMessage })
);

export const DiscoverySectionSchema = Schema.Struct({
  root: Schema.optionalWith(Schema.NonEmptyString, { exact: true }),
  manifestNames: Schema.optionalWith(Schema.NonEmptyArray(FileNameSchema), {
    default: () => MANIFEST_NAMES_DEFAULT,
  }),
  metadataFile: Schema.optionalWith(FileNameSchema, { default: () => METADATA_FILE_DEFAULT }),
});

export const ComposeSectionSchema = Schema.Struct({
  command: Schema.optionalWith(Schema.NonEmptyArray(Schema.NonEmptyString), {
    default: () => COMPOSE_COMMAND_DEFAULT,
  }),
});

export const LoggingSectionSchema = Schema.Struct({
  level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
    default: () => LOG_LEVEL_DEFAULT,
  }),
  format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
    default: () => LOG_FORMAT_DEFAULT,
  }),
});

export const GlobalConfigSchema = Schema.Struct({
  discovery: Schema.optionalWith(DiscoverySectionSchema, {
    default: () => ({
      manifestNames: MANIFEST_NAMES_DEFAULT,
      metadataFile: METADATA_FILE_DEFAULT,
    }),
  }),
  compose: Schema.optionalWith(ComposeSectionSchema, {
    default: () => ({ command: COMPOSE_COMMAND_DEFAULT }),
  }),
  logging: Schema.optionalWith(LoggingSectionSchema, {
    default: () => ({ level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT }),
  }),
});

export type GlobalConfig = typeof GlobalConfigSchema.Type;
