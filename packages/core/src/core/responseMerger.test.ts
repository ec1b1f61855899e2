/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  BlockedReason,
  FinishReason,
  HarmCategory,
  HarmProbability,
} from '@google/genai';
import {
  joinCandidateLists,
  joinCitationMetadata,
  joinContents,
  joinResponses,
  joinSafetyRatings,
  mergeResponses,
  type PartialResponse,
} from './responseMerger.js';
import { MergeContractViolation } from '../utils/errors.js';
import { candidateMessage, textMessage } from '../test-utils/responses.js';

describe('joinContents', () => {
  it('concatenates adjacent text parts into a single part', () => {
    const merged = joinContents([
      { role: 'model', parts: [{ text: 'Hello, ' }] },
      { role: 'model', parts: [{ text: 'world!' }] },
    ]);
    expect(merged).toEqual({ role: 'model', parts: [{ text: 'Hello, world!' }] });
  });

  it('starts a new part at a non-text boundary', () => {
    const call = { functionCall: { name: 'lookup', args: { q: 'x' } } };
    const merged = joinContents([
      { role: 'model', parts: [{ text: 'Let me check.' }] },
      { role: 'model', parts: [call] },
      { role: 'model', parts: [{ text: 'Done' }] },
    ]);
    expect(merged.parts).toEqual([{ text: 'Let me check.' }, call, { text: 'Done' }]);
  });

  it('keeps thought text apart from answer text', () => {
    const merged = joinContents([
      { role: 'model', parts: [{ text: 'thinking', thought: true }] },
      { role: 'model', parts: [{ text: 'answer' }] },
    ]);
    expect(merged.parts).toEqual([
      { text: 'thinking', thought: true },
      { text: 'answer' },
    ]);
  });

  it('does not modify its inputs', () => {
    const first = { role: 'model', parts: [{ text: 'a' }] };
    joinContents([first, { role: 'model', parts: [{ text: 'b' }] }]);
    expect(first.parts).toEqual([{ text: 'a' }]);
  });

  it('rejects contents with different roles', () => {
    expect(() =>
      joinContents([
        { role: 'model', parts: [{ text: 'a' }] },
        { role: 'user', parts: [{ text: 'b' }] },
      ]),
    ).toThrow(MergeContractViolation);
  });

  it('accepts chunks that omit the role', () => {
    const merged = joinContents([
      { role: 'model', parts: [{ text: 'a' }] },
      { parts: [{ text: 'b' }] },
    ]);
    expect(merged).toEqual({ role: 'model', parts: [{ text: 'ab' }] });
  });
});

describe('joinSafetyRatings', () => {
  it('keeps the latest probability and any blocked flag per category', () => {
    const merged = joinSafetyRatings([
      [
        {
          category: HarmCategory.HARM_CATEGORY_HARASSMENT,
          probability: HarmProbability.LOW,
          blocked: true,
        },
        {
          category: HarmCategory.HARM_CATEGORY_HATE_SPEECH,
          probability: HarmProbability.NEGLIGIBLE,
        },
      ],
      [
        {
          category: HarmCategory.HARM_CATEGORY_HARASSMENT,
          probability: HarmProbability.NEGLIGIBLE,
          blocked: false,
        },
      ],
    ]);
    expect(merged).toEqual([
      {
        category: HarmCategory.HARM_CATEGORY_HARASSMENT,
        probability: HarmProbability.NEGLIGIBLE,
        blocked: true,
      },
      {
        category: HarmCategory.HARM_CATEGORY_HATE_SPEECH,
        probability: HarmProbability.NEGLIGIBLE,
      },
    ]);
  });

  it('marks a category blocked when a later message blocks it', () => {
    const [rating] = joinSafetyRatings([
      [
        {
          category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
          probability: HarmProbability.LOW,
          blocked: false,
        },
      ],
      [
        {
          category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
          probability: HarmProbability.HIGH,
          blocked: true,
        },
      ],
    ]);
    expect(rating?.blocked).toBe(true);
    expect(rating?.probability).toBe(HarmProbability.HIGH);
  });

  it('merges by category even when messages list categories in another order', () => {
    const merged = joinSafetyRatings([
      [
        { category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, probability: HarmProbability.LOW },
        { category: HarmCategory.HARM_CATEGORY_HARASSMENT, probability: HarmProbability.LOW },
      ],
      [
        { category: HarmCategory.HARM_CATEGORY_HARASSMENT, probability: HarmProbability.MEDIUM },
      ],
    ]);
    expect(merged).toEqual([
      { category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, probability: HarmProbability.LOW },
      { category: HarmCategory.HARM_CATEGORY_HARASSMENT, probability: HarmProbability.MEDIUM },
    ]);
  });
});

describe('joinCitationMetadata', () => {
  it('concatenates citations in arrival order without deduplication', () => {
    const source = { uri: 'https://example.com/a', startIndex: 0, endIndex: 4 };
    expect(
      joinCitationMetadata([
        { citations: [source] },
        undefined,
        { citations: [source, { uri: 'https://example.com/b' }] },
      ]),
    ).toEqual({
      citations: [source, source, { uri: 'https://example.com/b' }],
    });
  });

  it('returns undefined when no message had citation metadata', () => {
    expect(joinCitationMetadata([undefined, undefined])).toBeUndefined();
  });
});

describe('joinCandidateLists', () => {
  it('groups by index, sorts ascending and keeps candidates that stop appearing', () => {
    const merged = joinCandidateLists([
      [
        { index: 1, content: { role: 'model', parts: [{ text: 'B1' }] } },
        { index: 0, content: { role: 'model', parts: [{ text: 'A1' }] } },
      ],
      [
        {
          index: 1,
          content: { role: 'model', parts: [{ text: 'B2' }] },
          finishReason: FinishReason.STOP,
        },
      ],
      [{ index: 2, content: { role: 'model', parts: [{ text: 'C1' }] } }],
    ]);
    expect(merged.map((candidate) => candidate.index)).toEqual([0, 1, 2]);
    expect(merged[0]?.content?.parts).toEqual([{ text: 'A1' }]);
    expect(merged[1]?.content?.parts).toEqual([{ text: 'B1B2' }]);
    expect(merged[1]?.finishReason).toBe(FinishReason.STOP);
  });

  it('takes the finish reason from the last message mentioning the candidate', () => {
    const [candidate] = joinCandidateLists([
      [{ index: 0, finishReason: FinishReason.MAX_TOKENS }],
      [{ index: 0, finishReason: FinishReason.SAFETY }],
      [{ index: 0, finishReason: FinishReason.RECITATION }],
    ]);
    expect(candidate?.finishReason).toBe(FinishReason.RECITATION);
  });

  it('treats a missing index as index 0', () => {
    const merged = joinCandidateLists([
      [{ content: { role: 'model', parts: [{ text: 'a' }] } }],
      [{ index: 0, content: { role: 'model', parts: [{ text: 'b' }] } }],
    ]);
    expect(merged).toHaveLength(1);
    expect(merged[0]?.content?.parts).toEqual([{ text: 'ab' }]);
  });
});

describe('mergeResponses', () => {
  it('keeps the prompt feedback of the first message', () => {
    const first: PartialResponse = {
      ...textMessage('a'),
      promptFeedback: { safetyRatings: [] },
    };
    const second: PartialResponse = {
      ...textMessage('b'),
      promptFeedback: { blockReason: BlockedReason.OTHER },
    };
    expect(mergeResponses(first, second).promptFeedback).toEqual({
      safetyRatings: [],
    });
  });

  it('lets a message without candidates contribute nothing else', () => {
    const merged = mergeResponses(textMessage('only'), {
      promptFeedback: { blockReason: BlockedReason.SAFETY },
    });
    expect(merged).toEqual(textMessage('only'));
  });

  it('takes the latest usage metadata and the first model version', () => {
    const merged = mergeResponses(
      {
        ...textMessage('a'),
        modelVersion: 'model-001',
        usageMetadata: { totalTokenCount: 4 },
      },
      {
        ...textMessage('b'),
        modelVersion: 'model-002',
        usageMetadata: { totalTokenCount: 9 },
      },
    );
    expect(merged.modelVersion).toBe('model-001');
    expect(merged.usageMetadata).toEqual({ totalTokenCount: 9 });
  });

  it('fails fast when a candidate changes role', () => {
    expect(() =>
      mergeResponses(textMessage('a'), {
        candidates: [{ index: 0, content: { role: 'user', parts: [{ text: 'b' }] } }],
      }),
    ).toThrow(MergeContractViolation);
  });
});

describe('joinResponses', () => {
  const m1 = candidateMessage([{ text: 'The ' }]);
  const m2 = candidateMessage([{ text: 'quick ' }, { inlineData: { mimeType: 'image/png', data: 'AAAA' } }]);
  const m3 = textMessage('fox', { finishReason: FinishReason.STOP });

  it('is the left fold of mergeResponses in arrival order', () => {
    expect(joinResponses([m1, m2, m3])).toEqual(
      mergeResponses(mergeResponses(m1, m2), m3),
    );
  });

  it('produces the merged candidate', () => {
    expect(joinResponses([m1, m2, m3])).toEqual({
      candidates: [
        {
          index: 0,
          content: {
            role: 'model',
            parts: [
              { text: 'The quick ' },
              { inlineData: { mimeType: 'image/png', data: 'AAAA' } },
              { text: 'fox' },
            ],
          },
          finishReason: FinishReason.STOP,
        },
      ],
    });
  });

  it('rejects an empty list', () => {
    expect(() => joinResponses([])).toThrow(MergeContractViolation);
  });
});
