/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  BaseResponseAccumulator,
  StreamState,
  pullAsync,
} from './baseResponseAccumulator.js';
import { ResponseAccumulator } from './responseAccumulator.js';
import type { PartialResponse } from './responseMerger.js';
import { EmptyStreamError } from '../utils/errors.js';

/**
 * The `for await` counterpart of {@link ResponseAccumulator}, for producers
 * such as `models.generateContentStream()`. Same states, lookahead and replay
 * rules; the only suspension points are pulling from the producer and
 * handing a step to the consumer.
 */
export class AsyncResponseAccumulator
  extends BaseResponseAccumulator
  implements AsyncIterable<ResponseAccumulator>
{
  private constructor(
    state: StreamState,
    first: PartialResponse,
    private readonly iterator?: AsyncIterator<PartialResponse>,
  ) {
    super(state, first);
  }

  static fromResponse(response: PartialResponse): AsyncResponseAccumulator {
    return new AsyncResponseAccumulator(StreamState.DONE, response);
  }

  static async fromStream(
    stream: AsyncIterable<PartialResponse>,
  ): Promise<AsyncResponseAccumulator> {
    const iterator = stream[Symbol.asyncIterator]();
    const first = await iterator.next();
    if (first.done) {
      throw new EmptyStreamError();
    }
    return new AsyncResponseAccumulator(
      StreamState.PENDING,
      first.value,
      iterator,
    );
  }

  async *iterate(): AsyncGenerator<ResponseAccumulator, void, undefined> {
    for (let step = 0; ; step++) {
      this.throwIfFailedAt(step);
      if (this.iterator && this.needsLookahead(step)) {
        this.record(await pullAsync(this.iterator));
      }
      const chunk = this.chunks.at(step);
      if (chunk === undefined) {
        return;
      }
      yield ResponseAccumulator.fromResponse(chunk);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<ResponseAccumulator> {
    return this.iterate();
  }

  async resolve(): Promise<void> {
    if (this.streamState === StreamState.DONE && !this.failure) {
      return;
    }
    const steps = this.iterate();
    while (!(await steps.next()).done) {
      // Discard the snapshot.
    }
  }
}
