/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

import { FilterCondition, FilterPrimitive, Metadata, VectorFilter } from '../models';

export function isFilterCondition(value: FilterPrimitive | FilterCondition): value is FilterCondition {
  return typeof value === 'object' && value !== null;
}

function matchesCondition(actual: unknown, condition: FilterCondition): boolean {
  if (condition.$eq !== undefined && actual !== condition.$eq) {
    return false;
  }
  if (condition.$ne !== undefined && actual === condition.$ne) {
    return false;
  }
  if (condition.$in !== undefined && !condition.$in.some(candidate => candidate === actual)) {
    return false;
  }

  const hasRange =
    condition.$gt !== undefined ||
    condition.$gte !== undefined ||
    condition.$lt !== undefined ||
    condition.$lte !== undefined;

  if (!hasRange) {
    return true;
  }
  if (typeof actual !== 'number') {
    return false;
  }

  return (
    (condition.$gt === undefined || actual > condition.$gt) &&
    (condition.$gte === undefined || actual >= condition.$gte) &&
    (condition.$lt === undefined || actual < condition.$lt) &&
    (condition.$lte === undefined || actual <= condition.$lte)
  );
}

/**
 * Check metadata against a filter. Every field of the filter must match.
 */
export function matchesFilter(metadata: Metadata, filter?: VectorFilter): boolean {
  if (!filter) {
    return true;
  }

  return Object.entries(filter).every(([key, expected]) => {
    const actual = metadata[key];
    return isFilterCondition(expected) ? matchesCondition(actual, expected) : actual === expected;
  });
}

export function isEmptyFilter(filter?: VectorFilter): boolean {
  return !filter || Object.keys(filter).length === 0;
}
