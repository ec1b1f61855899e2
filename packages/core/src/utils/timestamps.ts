/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { MalformedResponseError } from './errors.js';

/** Decodes an RFC 3339 timestamp from a service response. */
export function decodeTime(value: string | undefined): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new MalformedResponseError(`Invalid timestamp: ${value}`);
  }
  return date;
}
