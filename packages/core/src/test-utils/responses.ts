/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Candidate, Part } from '@google/genai';
import type { PartialResponse } from '../core/responseMerger.js';

/** A one-candidate message whose content is `parts`. */
export function candidateMessage(
  parts: Part[],
  overrides: Partial<Candidate> = {},
): PartialResponse {
  return {
    candidates: [
      {
        index: 0,
        content: { role: 'model', parts },
        ...overrides,
      },
    ],
  };
}

export function textMessage(
  text: string,
  overrides: Partial<Candidate> = {},
): PartialResponse {
  return candidateMessage([{ text }], overrides);
}

/**
 * A synchronous producer over `messages` that counts how often it was pulled
 * and optionally throws `error` once the messages run out.
 */
export class FakeStream implements Iterable<PartialResponse> {
  pulls = 0;

  constructor(
    private readonly messages: PartialResponse[],
    private readonly error?: Error,
  ) {}

  *[Symbol.iterator](): Iterator<PartialResponse> {
    for (const message of this.messages) {
      this.pulls++;
      yield message;
    }
    this.pulls++;
    if (this.error) {
      throw this.error;
    }
  }
}

/** The asynchronous counterpart of {@link FakeStream}. */
export class FakeAsyncStream implements AsyncIterable<PartialResponse> {
  pulls = 0;

  constructor(
    private readonly messages: PartialResponse[],
    private readonly error?: Error,
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<PartialResponse> {
    for (const message of this.messages) {
      this.pulls++;
      await Promise.resolve();
      yield message;
    }
    this.pulls++;
    if (this.error) {
      throw this.error;
    }
  }
}

export function stepTexts(steps: Iterable<{ text: string }>): string[] {
  return Array.from(steps, (step) => step.text);
}
