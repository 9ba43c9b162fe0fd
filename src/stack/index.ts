// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stack registry, selection and ordering.
 */

export type { Stack, StackLocation, StackMetadata } from "./types";
export { DEFAULT_METADATA, categoryLabel, makeStack, stackToJson } from "./types";

export {
  applyMetadata,
  decodeMetadata,
  loadMetadata,
  loadStack,
  renderMetadata,
  saveMetadata,
  toMetadataRecord,
} from "./metadata";
export type { LoadedMetadata, SidecarRecord } from "./metadata";

export {
  addTags,
  allCategories,
  allStacks,
  allTags,
  autostartSet,
  byCategory,
  byName,
  byTag,
  categoryUsage,
  discover,
  filterStacks,
  listStacks,
  makeRegistry,
  removeTags,
  renameCategory,
  renameTag,
  search,
  setCategory,
  tagUsage,
} from "./registry";
export type { CategoryChange, CategoryPair, DiscoverOptions, Registry, StackFilter } from "./registry";

export {
  SelectionRequest,
  describeSelection,
  requireSelection,
  resolve,
  selectionFromOptions,
} from "./selector";
export type { SelectionOptions } from "./selector";

export {
  dependentsOf,
  expandDependencies,
  findDanglingDependencies,
  withDependencies,
} from "./dependencies";

export { displayOrder, startOrder, stopOrder } from "./order";

export {
  collectStatuses,
  logLines,
  restartStacks,
  runBatch,
  startStacks,
  stopStacks,
  streamLogs,
} from "./orchestrator";
export type { BatchReport, BatchResult, StackHealth, StatusEntry, StatusReport } from "./orchestrator";

export { countBySeverity, validateStacks } from "./validate";
export type { IssueKind, IssueSeverity, ValidationIssue } from "./validate";
