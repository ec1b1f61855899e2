/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { parseChunkState } from './retrieverTypes.js';
import { InvalidArgumentError } from '../utils/errors.js';

// Response bodies of the retriever REST surface. Unknown fields are dropped.

export const CustomMetadataSchema = z.object({
  key: z.string(),
  stringValue: z.string().optional(),
  stringListValue: z.object({ values: z.array(z.string()) }).optional(),
  numericValue: z.number().optional(),
});

export const CorpusResourceSchema = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  createTime: z.string().optional(),
  updateTime: z.string().optional(),
});

export const DocumentResourceSchema = CorpusResourceSchema.extend({
  customMetadata: z.array(CustomMetadataSchema).optional(),
});

/** Accepts the state's name or its integer code. */
export const ChunkStateSchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    const state = parseChunkState(value);
    if (state === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown chunk state: ${value}`,
      });
      return z.NEVER;
    }
    return state;
  });

export const ChunkResourceSchema = z.object({
  name: z.string(),
  data: z.object({ stringValue: z.string().optional() }).optional(),
  customMetadata: z.array(CustomMetadataSchema).optional(),
  state: ChunkStateSchema.optional(),
  createTime: z.string().optional(),
  updateTime: z.string().optional(),
});

export const ListCorporaResponseSchema = z.object({
  corpora: z.array(CorpusResourceSchema).default([]),
  nextPageToken: z.string().optional(),
});

export const ListDocumentsResponseSchema = z.object({
  documents: z.array(DocumentResourceSchema).default([]),
  nextPageToken: z.string().optional(),
});

export const ListChunksResponseSchema = z.object({
  chunks: z.array(ChunkResourceSchema).default([]),
  nextPageToken: z.string().optional(),
});

export const QueryResponseSchema = z.object({
  relevantChunks: z
    .array(
      z.object({
        chunkRelevanceScore: z.number().optional(),
        chunk: ChunkResourceSchema,
      }),
    )
    .default([]),
});

export const BatchChunksResponseSchema = z.object({
  chunks: z.array(ChunkResourceSchema).default([]),
});

export const EmptyResponseSchema = z.object({});

export type CorpusResource = z.infer<typeof CorpusResourceSchema>;
export type DocumentResource = z.infer<typeof DocumentResourceSchema>;
export type ChunkResource = z.infer<typeof ChunkResourceSchema>;
export type ListCorporaResponse = z.infer<typeof ListCorporaResponseSchema>;
export type ListDocumentsResponse = z.infer<typeof ListDocumentsResponseSchema>;
export type ListChunksResponse = z.infer<typeof ListChunksResponseSchema>;
export type QueryResponse = z.infer<typeof QueryResponseSchema>;
export type BatchChunksResponse = z.infer<typeof BatchChunksResponseSchema>;

/** The error envelope the service returns with non-2xx statuses. */
export const ServiceErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
    status: z.string().optional(),
  }),
});

/** Validates the value given for one update path. */
export function parseUpdateValue<T>(
  schema: z.ZodType<T>,
  path: string,
  value: unknown,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `Invalid value for \`${path}\`: ${parsed.error.issues
        .map((issue) => issue.message)
        .join('; ')}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
