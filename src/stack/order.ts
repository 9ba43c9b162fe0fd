// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Sort policies over an already selected set of stacks. None of them
 * filter. Lower priority values start earlier and stop later.
 */

import { Array as Arr, Order } from "effect";
import type { Stack } from "./types";

const byPriority: Order.Order<Stack> = Order.mapInput(Order.number, (s: Stack) => s.priority);
const byCategory: Order.Order<Stack> = Order.mapInput(Order.string, (s: Stack) => s.category);
const byName: Order.Order<Stack> = Order.mapInput(Order.string, (s: Stack) => s.name);

/** (priority, category, name) ascending. */
export const StartOrder: Order.Order<Stack> = Order.combineAll([byPriority, byCategory, byName]);

/** Priority descending; ties keep their input order. */
export const StopOrder: Order.Order<Stack> = Order.reverse(byPriority);

export const startOrder = (stacks: Iterable<Stack>): Stack[] => Arr.sort(stacks, StartOrder);

export const stopOrder = (stacks: Iterable<Stack>): Stack[] => Arr.sort(stacks, StopOrder);

/** Listings and search results use the start order. */
export const displayOrder = startOrder;
