/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Content, Part } from '@google/genai';
import { InvalidArgumentError } from '../utils/errors.js';

/** Anything accepted where a single `Content` is expected. */
export type ContentInput = string | Part | Array<string | Part> | Content;

export function isContent(input: Part | Content): input is Content {
  return 'parts' in input || 'role' in input;
}

function isPart(input: ContentInput): input is Part {
  return typeof input !== 'string' && !Array.isArray(input) && !isContent(input);
}

function toPart(input: string | Part): Part {
  return typeof input === 'string' ? { text: input } : input;
}

/**
 * Normalises `input` to a `Content`. Bare text and parts are wrapped in a
 * content with `role` (default `user`); an existing `Content` is returned as
 * is.
 */
export function toContent(input: ContentInput, role = 'user'): Content {
  if (typeof input === 'string') {
    return { role, parts: [toPart(input)] };
  }
  if (Array.isArray(input)) {
    if (input.length === 0) {
      throw new InvalidArgumentError('Content must have at least one part.');
    }
    return { role, parts: input.map(toPart) };
  }
  if (isContent(input)) {
    return input;
  }
  return { role, parts: [input] };
}

export function toContents(inputs: ContentInput | ContentInput[]): Content[] {
  if (typeof inputs === 'string' || !Array.isArray(inputs)) {
    return [toContent(inputs)];
  }
  const items: ContentInput[] = inputs;
  if (items.length === 0) {
    return [];
  }
  // A flat list of parts is one turn, not several.
  if (items.every(isPart)) {
    return [toContent(items)];
  }
  return items.map((item) => toContent(item));
}
