/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  BaseResponseAccumulator,
  StreamState,
  pull,
} from './baseResponseAccumulator.js';
import type { PartialResponse } from './responseMerger.js';
import { EmptyStreamError } from '../utils/errors.js';

/**
 * Accumulates a response delivered through a blocking `Iterable` of partial
 * messages.
 *
 * Iterating yields one snapshot per message (each a completed accumulator
 * over that single message). Iterating again replays the buffered messages
 * and only pulls from the producer for steps not seen yet. Once iteration
 * has finished, `candidates`, `parts` and `text` describe the merged result.
 *
 * @example
 * const response = ResponseAccumulator.fromStream(messages);
 * for (const step of response) {
 *   process.stdout.write(step.text);
 * }
 * console.log(response.candidates[0]?.finishReason);
 */
export class ResponseAccumulator
  extends BaseResponseAccumulator
  implements Iterable<ResponseAccumulator>
{
  private constructor(
    state: StreamState,
    first: PartialResponse,
    private readonly iterator?: Iterator<PartialResponse>,
  ) {
    super(state, first);
  }

  /** Wraps a response that was received in one piece. */
  static fromResponse(response: PartialResponse): ResponseAccumulator {
    return new ResponseAccumulator(StreamState.DONE, response);
  }

  /**
   * Pulls the first message from `stream` right away. Errors raised by that
   * first pull propagate to the caller.
   */
  static fromStream(stream: Iterable<PartialResponse>): ResponseAccumulator {
    const iterator = stream[Symbol.iterator]();
    const first = iterator.next();
    if (first.done) {
      throw new EmptyStreamError();
    }
    return new ResponseAccumulator(StreamState.PENDING, first.value, iterator);
  }

  *iterate(): Generator<ResponseAccumulator, void, undefined> {
    for (let step = 0; ; step++) {
      this.throwIfFailedAt(step);
      if (this.iterator && this.needsLookahead(step)) {
        this.record(pull(this.iterator));
      }
      const chunk = this.chunks.at(step);
      if (chunk === undefined) {
        return;
      }
      yield ResponseAccumulator.fromResponse(chunk);
    }
  }

  [Symbol.iterator](): Iterator<ResponseAccumulator> {
    return this.iterate();
  }

  /**
   * Drains the stream so the accumulated accessors become available. Does
   * nothing once the stream is done; re-raises the latched error of a
   * failed or blocked stream.
   */
  resolve(): void {
    if (this.streamState === StreamState.DONE && !this.failure) {
      return;
    }
    const steps = this.iterate();
    while (!steps.next().done) {
      // Discard the snapshot.
    }
  }
}
