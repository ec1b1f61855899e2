/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { GenerateContentParameters } from '@google/genai';
import { ResponseAccumulator } from './responseAccumulator.js';
import { AsyncResponseAccumulator } from './asyncResponseAccumulator.js';
import type { PartialResponse } from './responseMerger.js';
import { getDefaultGenerativeClient } from '../config/clientManager.js';

/** The generation calls the SDK makes. `GoogleGenAI#models` satisfies it. */
export interface GenerativeClient {
  generateContent(params: GenerateContentParameters): Promise<PartialResponse>;
  generateContentStream(
    params: GenerateContentParameters,
  ): Promise<AsyncIterable<PartialResponse>>;
}

export async function generateContent(
  params: GenerateContentParameters,
  client: GenerativeClient = getDefaultGenerativeClient(),
): Promise<ResponseAccumulator> {
  return ResponseAccumulator.fromResponse(await client.generateContent(params));
}

/**
 * Starts a streamed generation. The returned accumulator has already received
 * the first message; iterate it with `for await` to receive the rest.
 *
 * @example
 * const response = await generateContentStream({ model, contents: 'Hi' });
 * for await (const step of response) {
 *   process.stdout.write(step.text);
 * }
 */
export async function generateContentStream(
  params: GenerateContentParameters,
  client: GenerativeClient = getDefaultGenerativeClient(),
): Promise<AsyncResponseAccumulator> {
  return AsyncResponseAccumulator.fromStream(
    await client.generateContentStream(params),
  );
}
