/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  CachedContent as CachedContentResource,
  CreateCachedContentParameters,
  DeleteCachedContentParameters,
  GetCachedContentParameters,
  ListCachedContentsParameters,
  UpdateCachedContentParameters,
} from '@google/genai';
import { InvalidArgumentError } from '../utils/errors.js';

export type { CachedContentResource };

/** The cache calls the SDK makes. `GoogleGenAI#caches` satisfies it. */
export interface CacheClient {
  create(params: CreateCachedContentParameters): Promise<CachedContentResource>;
  get(params: GetCachedContentParameters): Promise<CachedContentResource>;
  list(
    params?: ListCachedContentsParameters,
  ): Promise<AsyncIterable<CachedContentResource>>;
  update(params: UpdateCachedContentParameters): Promise<CachedContentResource>;
  delete(params: DeleteCachedContentParameters): Promise<unknown>;
}

/** A time-to-live: seconds, or a protobuf-style duration. */
export type TtlInput = number | { seconds: number; nanos?: number };

/** An absolute expiry: a Date, an RFC 3339 string or epoch seconds. */
export type ExpireTimeInput = Date | string | number;

/** Largest `seconds` a protobuf Duration holds (10,000 years). */
export const MAX_DURATION_SECONDS = 315_576_000_000;

const NANOS_PER_SECOND = 1_000_000_000;

function splitTtl(ttl: TtlInput): { seconds: number; nanos: number } | undefined {
  if (typeof ttl === 'number') {
    if (!Number.isFinite(ttl) || ttl < 0) {
      return undefined;
    }
    const seconds = Math.trunc(ttl);
    const nanos = Math.round((ttl - seconds) * NANOS_PER_SECOND);
    return nanos === NANOS_PER_SECOND
      ? { seconds: seconds + 1, nanos: 0 }
      : { seconds, nanos };
  }
  const nanos = ttl.nanos ?? 0;
  if (
    !Number.isInteger(ttl.seconds) ||
    ttl.seconds < 0 ||
    !Number.isInteger(nanos) ||
    nanos < 0 ||
    nanos >= NANOS_PER_SECOND
  ) {
    return undefined;
  }
  return { seconds: ttl.seconds, nanos };
}

/**
 * Converts a TTL to the duration string the service takes: whole seconds
 * plus up to nine fractional digits, e.g. `"300s"` or `"0.0000001s"`.
 */
export function toOptionalTtl(ttl: TtlInput | undefined): string | undefined {
  if (ttl === undefined) {
    return undefined;
  }
  const duration = splitTtl(ttl);
  if (!duration || duration.seconds > MAX_DURATION_SECONDS) {
    throw new InvalidArgumentError(
      `Could not convert ${JSON.stringify(ttl)} to a duration: expected ` +
        `a non-negative number of seconds up to ${MAX_DURATION_SECONDS}.`,
    );
  }
  if (duration.nanos === 0) {
    return `${duration.seconds}s`;
  }
  const fraction = String(duration.nanos).padStart(9, '0').replace(/0+$/, '');
  return `${duration.seconds}.${fraction}s`;
}

export function toOptionalExpireTime(
  expireTime: ExpireTimeInput | undefined,
): string | undefined {
  if (expireTime === undefined) {
    return undefined;
  }
  const date =
    expireTime instanceof Date
      ? expireTime
      : new Date(
          typeof expireTime === 'number' ? expireTime * 1000 : expireTime,
        );
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(
      `Could not convert ${String(expireTime)} to a timestamp.`,
    );
  }
  return date.toISOString();
}
