/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { GenerateContentResponse } from '@google/genai';

type PromptFeedbackHolder = Pick<GenerateContentResponse, 'promptFeedback'>;

/**
 * Base class for every error raised by the SDK itself. Errors thrown by the
 * upstream producer of a stream are re-raised as-is and never wrapped.
 */
export abstract class SdkError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Raised when the prompt feedback of a response carries a block reason. The
 * offending response is kept so callers can inspect the feedback.
 */
export class BlockedPromptError extends SdkError {
  constructor(readonly response: PromptFeedbackHolder) {
    const feedback = response.promptFeedback;
    const details = feedback?.blockReasonMessage
      ? `${feedback.blockReason}: ${feedback.blockReasonMessage}`
      : `${feedback?.blockReason}`;
    super(`The prompt was blocked (${details}).`, 'BLOCKED_PROMPT');
  }
}

export class IncompleteIterationError extends SdkError {
  constructor() {
    super(
      'Please let the response complete iteration before accessing the final ' +
        'accumulated attributes (or call `response.resolve()`).',
      'INCOMPLETE_ITERATION',
    );
  }
}

/** Raised by the single-value convenience accessors (`parts`, `text`). */
export class AmbiguousAccessorError extends SdkError {
  constructor(message: string) {
    super(message, 'AMBIGUOUS_ACCESSOR');
  }
}

/**
 * The producer broke an invariant of the protocol, e.g. a candidate changed
 * role halfway through a stream. Not recoverable.
 */
export class MergeContractViolation extends SdkError {
  constructor(message: string) {
    super(message, 'MERGE_CONTRACT_VIOLATION');
  }
}

export class EmptyStreamError extends SdkError {
  constructor() {
    super('The response stream ended before producing any message.', 'EMPTY_STREAM');
  }
}

export class InvalidArgumentError extends SdkError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_ARGUMENT', options);
  }
}

export class ConfigurationError extends SdkError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIGURATION_ERROR', options);
  }
}

/** A service response did not have the shape the SDK expects. */
export class MalformedResponseError extends SdkError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'MALFORMED_RESPONSE', options);
  }
}

/** A REST call to the retriever service returned a non-2xx status. */
export class RetrieverRequestError extends SdkError {
  constructor(
    readonly status: number,
    readonly method: string,
    readonly path: string,
    serviceMessage: string,
  ) {
    super(
      `${method} ${path} failed with status ${status}: ${serviceMessage}`,
      'RETRIEVER_REQUEST_FAILED',
    );
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      method: this.method,
      path: this.path,
    };
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}
