/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  BlockedReason,
  type Candidate,
  type GenerateContentResponsePromptFeedback,
  type GenerateContentResponseUsageMetadata,
  type Part,
} from '@google/genai';
import { mergeResponses, type PartialResponse } from './responseMerger.js';
import {
  AmbiguousAccessorError,
  BlockedPromptError,
  IncompleteIterationError,
  getErrorMessage,
} from '../utils/errors.js';
import { createDebugLogger } from '../utils/debugLogger.js';

const logger = createDebugLogger('ResponseAccumulator');

export enum StreamState {
  /** More messages may follow. */
  PENDING = 'pending',
  /** The producer is exhausted; the accumulated result is final. */
  DONE = 'done',
  /** Iteration stopped on an error; everything merged before it is kept. */
  FAILED = 'failed',
}

/** Outcome of pulling one message from the producer. */
export type PullResult<T> =
  | { kind: 'item'; value: T }
  | { kind: 'end' }
  | { kind: 'error'; error: unknown };

export function pull<T>(iterator: Iterator<T>): PullResult<T> {
  try {
    const result = iterator.next();
    return result.done ? { kind: 'end' } : { kind: 'item', value: result.value };
  } catch (error) {
    return { kind: 'error', error };
  }
}

export async function pullAsync<T>(
  iterator: AsyncIterator<T>,
): Promise<PullResult<T>> {
  try {
    const result = await iterator.next();
    return result.done ? { kind: 'end' } : { kind: 'item', value: result.value };
  } catch (error) {
    return { kind: 'error', error };
  }
}

export function isPromptBlocked(
  feedback: GenerateContentResponsePromptFeedback | undefined,
): boolean {
  return (
    feedback?.blockReason !== undefined &&
    feedback.blockReason !== BlockedReason.BLOCKED_REASON_UNSPECIFIED
  );
}

/** An error held back until iteration reaches `step`. */
interface LatchedFailure {
  error: unknown;
  step: number;
}

/**
 * State shared by the blocking and the asynchronous accumulators: the buffer
 * of messages seen so far, their running merge, and the accessors over it.
 *
 * Iteration keeps one message of lookahead so the last step is only yielded
 * once the end of the stream is known. A single cursor is shared by every
 * iteration of an instance, so it must not be iterated from two places at
 * once.
 */
export abstract class BaseResponseAccumulator {
  protected readonly chunks: PartialResponse[];
  protected result: PartialResponse;
  protected streamState: StreamState;
  protected failure?: LatchedFailure;

  protected constructor(state: StreamState, first: PartialResponse) {
    this.streamState = state;
    this.result = first;
    this.chunks = [first];
    if (isPromptBlocked(first.promptFeedback)) {
      this.failure = { error: new BlockedPromptError(first), step: 0 };
      if (state === StreamState.PENDING) {
        this.streamState = StreamState.FAILED;
      }
    }
  }

  get state(): StreamState {
    return this.streamState;
  }

  /** Number of messages pulled from the producer so far. */
  get chunkCount(): number {
    return this.chunks.length;
  }

  get promptFeedback(): GenerateContentResponsePromptFeedback | undefined {
    return this.result.promptFeedback;
  }

  get candidates(): Candidate[] {
    this.assertFinished();
    return this.result.candidates ?? [];
  }

  get usageMetadata(): GenerateContentResponseUsageMetadata | undefined {
    this.assertFinished();
    return this.result.usageMetadata;
  }

  /** The parts of the only candidate. */
  get parts(): Part[] {
    const candidates = this.candidates;
    const [candidate] = candidates;
    if (!candidate) {
      throw new AmbiguousAccessorError(
        'The `parts` quick accessor only works for a single candidate, but ' +
          'none were returned. Check `promptFeedback` to see if the prompt ' +
          'was blocked.',
      );
    }
    if (candidates.length > 1) {
      throw new AmbiguousAccessorError(
        'The `parts` quick accessor only works with a single candidate. ' +
          'With multiple candidates use `candidates[index].content.parts`.',
      );
    }
    const parts = candidate.content?.parts ?? [];
    if (parts.length === 0) {
      throw new AmbiguousAccessorError(
        'The `parts` quick accessor requires the candidate to have content, ' +
          `but it has none (finish reason: ${candidate.finishReason}).`,
      );
    }
    return parts;
  }

  /** The text of a simple single-part text response. */
  get text(): string {
    const parts = this.parts;
    const [part] = parts;
    if (parts.length > 1 || typeof part?.text !== 'string') {
      throw new AmbiguousAccessorError(
        'The `text` quick accessor only works for simple (single-part) text ' +
          'responses. Use the `parts` accessor or ' +
          '`candidates[index].content.parts` instead.',
      );
    }
    return part.text;
  }

  toJSON(): PartialResponse {
    return this.result;
  }

  private assertFinished(): void {
    if (this.streamState === StreamState.PENDING) {
      throw new IncompleteIterationError();
    }
  }

  /** Throws the latched error once iteration reaches the step it belongs to. */
  protected throwIfFailedAt(step: number): void {
    if (this.failure && step >= this.failure.step) {
      throw this.failure.error;
    }
  }

  /** A pull is due when the step about to be yielded is the last buffered. */
  protected needsLookahead(step: number): boolean {
    return (
      this.streamState === StreamState.PENDING &&
      step >= this.chunks.length - 1
    );
  }

  protected record(outcome: PullResult<PartialResponse>): void {
    switch (outcome.kind) {
      case 'item':
        this.chunks.push(outcome.value);
        this.result = mergeResponses(this.result, outcome.value);
        logger.debug(`Merged message ${this.chunks.length} of the stream.`);
        if (isPromptBlocked(outcome.value.promptFeedback)) {
          // A blocked message poisons the stream; nothing after it is pulled.
          this.failure = {
            error: new BlockedPromptError(outcome.value),
            step: this.chunks.length - 1,
          };
          this.streamState = StreamState.FAILED;
          logger.debug(`Prompt blocked at message ${this.chunks.length}.`);
        }
        return;
      case 'end':
        this.streamState = StreamState.DONE;
        logger.debug(`Stream complete after ${this.chunks.length} messages.`);
        return;
      case 'error':
        // Everything already buffered is still yielded before the error.
        this.failure = { error: outcome.error, step: this.chunks.length };
        this.streamState = StreamState.FAILED;
        logger.debug(
          `Stream failed after ${this.chunks.length} messages: ${getErrorMessage(outcome.error)}`,
        );
        return;
      default: {
        const unreachable: never = outcome;
        throw new Error(`Unhandled pull result: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
