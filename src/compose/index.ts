// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export {
  ComposeExecutor,
  ComposeExecutorLive,
  DEFAULT_LOG_OPTIONS,
  logsArgs,
  makeComposeExecutor,
  upArgs,
} from "./executor";
export type { ComposeExecutorValue, LogOptions, StartOptions } from "./executor";
export { STOPPED, parseComposePs, parseContainers, summarize } from "./status";
export type { ContainerInfo, StackState, StackStatus } from "./status";
