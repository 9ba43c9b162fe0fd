// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stack types. A Stack is one directory holding a compose manifest plus the
 * user-authored metadata from its sidecar file. Identity (name and
 * location) is derived at discovery; everything else comes from the
 * sidecar. Stacks are immutable: edits build a new value.
 */

import { Option } from "effect";
import type { AbsolutePath } from "../lib/types";

/** Mutable fields, as persisted in the sidecar. */
export interface StackMetadata {
  readonly description: string;
  readonly category: string;
  readonly subcategory: string;
  readonly tags: readonly string[];
  readonly priority: number;
  readonly autoStart: boolean;
  readonly dependsOn: readonly string[];
  readonly critical: boolean;
  readonly owner: string;
  readonly documentation: string;
  readonly healthCheckUrl: string;
  readonly expectedContainers: number;
}

export interface Stack extends StackMetadata {
  /** Relative directory segments joined with `-`. */
  readonly name: string;
  /** Directory containing the manifest. */
  readonly path: AbsolutePath;
  readonly manifest: AbsolutePath;
  readonly metaFile: AbsolutePath;
  /** Whether the sidecar existed when the stack was loaded. */
  readonly hasMetaFile: boolean;
  /** A `name` key found in the sidecar; never used for identity. */
  readonly declaredName: Option.Option<string>;
}

export const DEFAULT_CATEGORY = "uncategorized";
export const DEFAULT_PRIORITY = 5;

export const DEFAULT_METADATA: StackMetadata = {
  description: "",
  category: DEFAULT_CATEGORY,
  subcategory: "",
  tags: [],
  priority: DEFAULT_PRIORITY,
  autoStart: false,
  dependsOn: [],
  critical: false,
  owner: "",
  documentation: "",
  healthCheckUrl: "",
  expectedContainers: 0,
};

export interface StackLocation {
  readonly name: string;
  readonly path: AbsolutePath;
  readonly manifest: AbsolutePath;
  readonly metaFile: AbsolutePath;
}

/** A stack carrying only defaults, before its sidecar is applied. */
export const makeStack = (location: StackLocation): Stack => ({
  ...DEFAULT_METADATA,
  ...location,
  hasMetaFile: false,
  declaredName: Option.none(),
});

/** `category/subcategory`, or just the category when there is none. */
export const categoryLabel = (category: string, subcategory: string): string =>
  subcategory === "" ? category : `${category}/${subcategory}`;

/** Serializable view for JSON output. */
export const stackToJson = (stack: Stack): Record<string, unknown> => ({
  name: stack.name,
  path: stack.path,
  manifest: stack.manifest,
  description: stack.description,
  category: stack.category,
  subcategory: stack.subcategory,
  tags: stack.tags,
  priority: stack.priority,
  autoStart: stack.autoStart,
  dependsOn: stack.dependsOn,
  critical: stack.critical,
  owner: stack.owner,
  documentation: stack.documentation,
  healthCheckUrl: stack.healthCheckUrl,
  expectedContainers: stack.expectedContainers,
  hasMetaFile: stack.hasMetaFile,
});
