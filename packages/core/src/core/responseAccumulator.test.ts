/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { BlockedReason, FinishReason } from '@google/genai';
import { ResponseAccumulator } from './responseAccumulator.js';
import { StreamState } from './baseResponseAccumulator.js';
import type { PartialResponse } from './responseMerger.js';
import {
  AmbiguousAccessorError,
  BlockedPromptError,
  EmptyStreamError,
  IncompleteIterationError,
} from '../utils/errors.js';
import {
  FakeStream,
  candidateMessage,
  stepTexts,
  textMessage,
} from '../test-utils/responses.js';

const blockedMessage: PartialResponse = {
  promptFeedback: {
    blockReason: BlockedReason.SAFETY,
    blockReasonMessage: 'unsafe prompt',
  },
};

describe('ResponseAccumulator', () => {
  describe('fromResponse', () => {
    it('is done immediately and exposes the text without iterating', () => {
      const response = ResponseAccumulator.fromResponse(textMessage('OK'));
      expect(response.state).toBe(StreamState.DONE);
      expect(response.text).toBe('OK');
    });

    it('yields the single message once per iteration', () => {
      const response = ResponseAccumulator.fromResponse(textMessage('OK'));
      expect(stepTexts(response)).toEqual(['OK']);
      expect(stepTexts(response)).toEqual(['OK']);
    });
  });

  describe('fromStream', () => {
    it('pulls exactly one message on construction', () => {
      const stream = new FakeStream([textMessage('a'), textMessage('b')]);
      const response = ResponseAccumulator.fromStream(stream);
      expect(stream.pulls).toBe(1);
      expect(response.state).toBe(StreamState.PENDING);
      expect(response.chunkCount).toBe(1);
    });

    it('throws when the producer is empty', () => {
      expect(() => ResponseAccumulator.fromStream([])).toThrow(EmptyStreamError);
    });

    it('propagates an error raised by the first pull', () => {
      const failure = new Error('connection reset');
      expect(() =>
        ResponseAccumulator.fromStream(new FakeStream([], failure)),
      ).toThrow(failure);
    });
  });

  describe('iteration', () => {
    it('yields one snapshot per message and merges them', () => {
      const response = ResponseAccumulator.fromStream(
        new FakeStream([
          textMessage('Hello, '),
          textMessage('world'),
          textMessage('!', { finishReason: FinishReason.STOP }),
        ]),
      );

      const steps = [...response];
      expect(steps.map((step) => step.text)).toEqual(['Hello, ', 'world', '!']);
      expect(steps.every((step) => step.state === StreamState.DONE)).toBe(true);
      expect(response.state).toBe(StreamState.DONE);
      expect(response.text).toBe('Hello, world!');
      expect(response.candidates[0]?.finishReason).toBe(FinishReason.STOP);
    });

    it('knows the stream is done by the time the last step is yielded', () => {
      const response = ResponseAccumulator.fromStream(
        new FakeStream([textMessage('a'), textMessage('b')]),
      );
      const seen: string[] = [];
      for (const step of response) {
        seen.push(`${step.text}:${response.state}`);
      }
      expect(seen).toEqual(['a:pending', 'b:done']);
    });

    it('replays buffered steps without pulling again', () => {
      const stream = new FakeStream([
        textMessage('one '),
        textMessage('two '),
        textMessage('three'),
      ]);
      const response = ResponseAccumulator.fromStream(stream);

      const first = stepTexts(response);
      const pullsAfterFirstPass = stream.pulls;
      const second = stepTexts(response);

      expect(first).toEqual(['one ', 'two ', 'three']);
      expect(second).toEqual(first);
      // Three messages plus the pull that found the end.
      expect(pullsAfterFirstPass).toBe(4);
      expect(stream.pulls).toBe(4);
    });

    it('continues where an abandoned iteration stopped', () => {
      const stream = new FakeStream([textMessage('a'), textMessage('b'), textMessage('c')]);
      const response = ResponseAccumulator.fromStream(stream);

      for (const step of response) {
        expect(step.text).toBe('a');
        break;
      }
      expect(response.state).toBe(StreamState.PENDING);
      expect(() => response.text).toThrow(IncompleteIterationError);

      expect(stepTexts(response)).toEqual(['a', 'b', 'c']);
      expect(response.text).toBe('abc');
    });
  });

  describe('upstream failures', () => {
    it('yields every buffered step, then raises the original error', () => {
      const failure = new Error('stream broke');
      const response = ResponseAccumulator.fromStream(
        new FakeStream([textMessage('a'), textMessage('b')], failure),
      );

      const seen: string[] = [];
      expect(() => {
        for (const step of response) {
          seen.push(step.text);
        }
      }).toThrow(failure);
      expect(seen).toEqual(['a', 'b']);
      expect(response.state).toBe(StreamState.FAILED);
    });

    it('keeps the error latched and the merged result readable', () => {
      const failure = new Error('stream broke');
      const stream = new FakeStream([textMessage('par'), textMessage('tial')], failure);
      const response = ResponseAccumulator.fromStream(stream);

      expect(() => response.resolve()).toThrow(failure);
      const pulls = stream.pulls;

      expect(() => response.resolve()).toThrow(failure);
      expect(() => [...response]).toThrow(failure);
      expect(stream.pulls).toBe(pulls);
      expect(response.text).toBe('partial');
    });
  });

  describe('blocked prompts', () => {
    it('raises BlockedPromptError and still exposes the feedback', () => {
      const response = ResponseAccumulator.fromStream(new FakeStream([blockedMessage]));

      expect(response.state).toBe(StreamState.FAILED);
      expect(() => [...response]).toThrow(BlockedPromptError);
      expect(() => response.resolve()).toThrow(BlockedPromptError);
      expect(response.promptFeedback?.blockReason).toBe(BlockedReason.SAFETY);
    });

    it('never pulls past a blocked first message', () => {
      const stream = new FakeStream([blockedMessage, textMessage('ignored')]);
      const response = ResponseAccumulator.fromStream(stream);
      expect(() => response.resolve()).toThrow(BlockedPromptError);
      expect(stream.pulls).toBe(1);
    });

    it('stops at a blocked message later in the stream', () => {
      const blockedLater: PartialResponse = {
        ...textMessage('b'),
        promptFeedback: { blockReason: BlockedReason.SAFETY },
      };
      const stream = new FakeStream([
        textMessage('a'),
        blockedLater,
        textMessage('c'),
      ]);
      const response = ResponseAccumulator.fromStream(stream);

      const seen: string[] = [];
      expect(() => {
        for (const step of response) {
          seen.push(step.text);
        }
      }).toThrow(BlockedPromptError);
      expect(seen).toEqual(['a']);
      expect(response.state).toBe(StreamState.FAILED);
      expect(stream.pulls).toBe(2);

      expect(() => stepTexts(response)).toThrow(BlockedPromptError);
      expect(() => response.resolve()).toThrow(BlockedPromptError);
      expect(stream.pulls).toBe(2);
    });

    it('reports that no candidates came back', () => {
      const response = ResponseAccumulator.fromStream(new FakeStream([blockedMessage]));
      expect(response.candidates).toEqual([]);
      expect(() => response.parts).toThrow(AmbiguousAccessorError);
    });

    it('raises on iteration of a blocked complete response', () => {
      const response = ResponseAccumulator.fromResponse(blockedMessage);
      expect(response.state).toBe(StreamState.DONE);
      expect(() => response.resolve()).toThrow(BlockedPromptError);
    });
  });

  describe('accessors', () => {
    it('guards the accumulated result until the stream is drained', () => {
      const response = ResponseAccumulator.fromStream(
        new FakeStream([textMessage('a'), textMessage('b')]),
      );
      expect(() => response.text).toThrow(IncompleteIterationError);
      expect(() => response.candidates).toThrow(IncompleteIterationError);
      expect(() => response.usageMetadata).toThrow(IncompleteIterationError);

      response.resolve();
      expect(response.text).toBe('ab');
    });

    it('exposes prompt feedback before iteration', () => {
      const response = ResponseAccumulator.fromStream(
        new FakeStream([
          { ...textMessage('a'), promptFeedback: { safetyRatings: [] } },
          textMessage('b'),
        ]),
      );
      expect(response.promptFeedback).toEqual({ safetyRatings: [] });
    });

    it('rejects parts for several candidates', () => {
      const response = ResponseAccumulator.fromResponse({
        candidates: [
          { index: 0, content: { role: 'model', parts: [{ text: 'a' }] } },
          { index: 1, content: { role: 'model', parts: [{ text: 'b' }] } },
        ],
      });
      expect(response.candidates).toHaveLength(2);
      expect(() => response.parts).toThrow(AmbiguousAccessorError);
    });

    it('rejects parts for a candidate without content', () => {
      const response = ResponseAccumulator.fromResponse({
        candidates: [{ index: 0, finishReason: FinishReason.SAFETY }],
      });
      expect(() => response.parts).toThrow(AmbiguousAccessorError);
    });

    it('rejects text for multi-part or non-text responses', () => {
      const call = { functionCall: { name: 'lookup', args: {} } };
      const multiPart = ResponseAccumulator.fromResponse(
        candidateMessage([{ text: 'a' }, call]),
      );
      const nonText = ResponseAccumulator.fromResponse(candidateMessage([call]));

      expect(multiPart.parts).toHaveLength(2);
      expect(() => multiPart.text).toThrow(AmbiguousAccessorError);
      expect(() => nonText.text).toThrow(AmbiguousAccessorError);
    });

    it('serialises the accumulated result', () => {
      const response = ResponseAccumulator.fromResponse(textMessage('OK'));
      expect(JSON.parse(JSON.stringify(response))).toEqual(textMessage('OK'));
    });
  });
});
