/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  Candidate,
  CitationMetadata,
  Content,
  GenerateContentResponse,
  HarmCategory,
  Part,
  SafetyRating,
} from '@google/genai';
import { MergeContractViolation } from '../utils/errors.js';

/**
 * The parts of a `GenerateContentResponse` the SDK reads and produces. Every
 * response yielded by `@google/genai` satisfies it, and so do plain objects.
 */
export type PartialResponse = Pick<
  GenerateContentResponse,
  'candidates' | 'promptFeedback' | 'usageMetadata' | 'modelVersion' | 'responseId'
>;

function isTextPart(part: Part): part is Part & { text: string } {
  return typeof part.text === 'string';
}

/**
 * Concatenates the parts of several contents of one candidate. A text part
 * directly followed by another text part (of the same thought-ness) becomes
 * a single part; anything else starts a new part.
 */
export function joinContents(contents: readonly Content[]): Content {
  const roles = new Set(
    contents.flatMap((content) => (content.role ? [content.role] : [])),
  );
  if (roles.size > 1) {
    throw new MergeContractViolation(
      `Cannot join contents with different roles: ${[...roles].join(', ')}.`,
    );
  }
  const [role] = roles;

  const parts: Part[] = [];
  for (const content of contents) {
    for (const part of content.parts ?? []) {
      const last = parts.at(-1);
      if (
        last &&
        isTextPart(last) &&
        isTextPart(part) &&
        Boolean(last.thought) === Boolean(part.thought)
      ) {
        parts[parts.length - 1] = { ...last, text: last.text + part.text };
      } else {
        parts.push(part);
      }
    }
  }

  return role === undefined ? { parts } : { role, parts };
}

/**
 * Merges safety ratings by category: the latest probability wins and a
 * category stays blocked once any message reported it blocked.
 */
export function joinSafetyRatings(
  ratingLists: ReadonlyArray<readonly SafetyRating[]>,
): SafetyRating[] {
  const byCategory = new Map<HarmCategory | undefined, SafetyRating>();
  for (const ratings of ratingLists) {
    for (const rating of ratings) {
      const previous = byCategory.get(rating.category);
      const merged: SafetyRating = { ...previous, ...rating };
      if (previous?.blocked || rating.blocked) {
        merged.blocked = true;
      }
      byCategory.set(rating.category, merged);
    }
  }
  return [...byCategory.values()];
}

export function joinCitationMetadata(
  metadatas: ReadonlyArray<CitationMetadata | undefined>,
): CitationMetadata | undefined {
  const present = metadatas.filter(
    (metadata): metadata is CitationMetadata => metadata !== undefined,
  );
  if (present.length === 0) {
    return undefined;
  }
  return { citations: present.flatMap((metadata) => metadata.citations ?? []) };
}

/** Merges successive messages about one candidate index, oldest first. */
export function joinCandidates(candidates: readonly Candidate[]): Candidate {
  const first = candidates.at(0);
  const last = candidates.at(-1);
  if (!first || !last) {
    throw new MergeContractViolation('Cannot join an empty list of candidates.');
  }
  const index = first.index ?? 0;
  if (candidates.some((candidate) => (candidate.index ?? 0) !== index)) {
    throw new MergeContractViolation(
      `Cannot join candidates with different indexes into candidate ${index}.`,
    );
  }

  // Scalar fields such as finishMessage or tokenCount follow the latest
  // message that set them.
  const merged = candidates.reduce<Candidate>(
    (acc, candidate) => ({ ...acc, ...candidate }),
    {},
  );

  const contents = candidates.flatMap((candidate) =>
    candidate.content ? [candidate.content] : [],
  );
  if (contents.length > 0) {
    merged.content = joinContents(contents);
  }

  if (last.finishReason === undefined) {
    delete merged.finishReason;
  } else {
    merged.finishReason = last.finishReason;
  }

  const ratingLists = candidates.flatMap((candidate) =>
    candidate.safetyRatings ? [candidate.safetyRatings] : [],
  );
  if (ratingLists.length > 0) {
    merged.safetyRatings = joinSafetyRatings(ratingLists);
  }

  const citationMetadata = joinCitationMetadata(
    candidates.map((candidate) => candidate.citationMetadata),
  );
  if (citationMetadata) {
    merged.citationMetadata = citationMetadata;
  }

  return merged;
}

/**
 * Groups candidates from several messages by index and merges each group.
 * A candidate that stops appearing is finished, not removed, so every index
 * ever seen is kept. The result is sorted by index.
 */
export function joinCandidateLists(
  candidateLists: ReadonlyArray<readonly Candidate[]>,
): Candidate[] {
  const groups = new Map<number, Candidate[]>();
  for (const candidates of candidateLists) {
    for (const candidate of candidates) {
      const index = candidate.index ?? 0;
      const group = groups.get(index);
      if (group) {
        group.push(candidate);
      } else {
        groups.set(index, [candidate]);
      }
    }
  }
  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, group]) => joinCandidates(group));
}

/**
 * Folds `next` into the accumulated `existing` response. Pure: neither input
 * is modified.
 */
export function mergeResponses(
  existing: PartialResponse,
  next: PartialResponse,
): PartialResponse {
  const merged: PartialResponse = {};

  const candidateLists = [existing, next].flatMap((response) =>
    response.candidates ? [response.candidates] : [],
  );
  if (candidateLists.length > 0) {
    merged.candidates = joinCandidateLists(candidateLists);
  }

  // Only the first message's prompt feedback counts for the whole stream.
  if (existing.promptFeedback) {
    merged.promptFeedback = existing.promptFeedback;
  }

  const usageMetadata = next.usageMetadata ?? existing.usageMetadata;
  if (usageMetadata) {
    merged.usageMetadata = usageMetadata;
  }
  const modelVersion = existing.modelVersion || next.modelVersion;
  if (modelVersion) {
    merged.modelVersion = modelVersion;
  }
  const responseId = existing.responseId || next.responseId;
  if (responseId) {
    merged.responseId = responseId;
  }

  return merged;
}

/** Left fold of `mergeResponses` over messages in arrival order. */
export function joinResponses(
  responses: readonly PartialResponse[],
): PartialResponse {
  const [first, ...rest] = responses;
  if (!first) {
    throw new MergeContractViolation('Cannot join an empty list of responses.');
  }
  return rest.reduce(mergeResponses, first);
}
