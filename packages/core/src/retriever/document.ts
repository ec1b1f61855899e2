/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { Chunk } from './chunk.js';
import type {
  ChunkInput,
  CreateChunkRequest,
  RetrieverClient,
  UpdateChunkRequest,
} from './restRetrieverClient.js';
import {
  CustomMetadataSchema,
  parseUpdateValue,
  type DocumentResource,
  type QueryResponse,
} from './retrieverSchemas.js';
import {
  CHUNK_NAME_REGEX,
  resolveChildName,
  toWireMetadataFilters,
  validateResultsCount,
  type ChunkData,
  type CustomMetadata,
  type PageOptions,
  type QueryOptions,
} from './retrieverTypes.js';
import { getDefaultRetrieverClient } from '../config/clientManager.js';
import { flattenUpdatePaths } from '../utils/flattenUpdatePaths.js';
import { decodeTime } from '../utils/timestamps.js';
import { InvalidArgumentError } from '../utils/errors.js';
import { createDebugLogger } from '../utils/debugLogger.js';

const logger = createDebugLogger('Document');

export interface CreateChunkOptions {
  customMetadata?: CustomMetadata[];
}

/** Any of the shapes `batchCreateChunks` accepts for one chunk. */
export type BatchCreateChunkInput =
  | string
  | [name: string, data: string]
  | { name?: string; data: string | ChunkData; customMetadata?: CustomMetadata[] };

export type BatchUpdateChunksInput =
  | Record<string, Record<string, unknown>>
  | Array<[name: string, updates: Record<string, unknown>]>;

export interface RelevantChunk {
  chunkRelevanceScore?: number;
  chunk: Chunk;
}

export interface ChunkPage {
  chunks: Chunk[];
  nextPageToken?: string;
}

export function toRelevantChunks(response: QueryResponse): RelevantChunk[] {
  return response.relevantChunks.map(({ chunkRelevanceScore, chunk }) => ({
    chunkRelevanceScore,
    chunk: Chunk.fromResource(chunk),
  }));
}

/** A `Document` groups the `Chunk`s of one source within a corpus. */
export class Document {
  private constructor(
    readonly name: string,
    public displayName: string | undefined,
    public customMetadata: CustomMetadata[],
    public createTime: Date | undefined,
    public updateTime: Date | undefined,
  ) {}

  static fromResource(resource: DocumentResource): Document {
    return new Document(
      resource.name,
      resource.displayName,
      resource.customMetadata ?? [],
      decodeTime(resource.createTime),
      decodeTime(resource.updateTime),
    );
  }

  private chunkName(name: string): string {
    return resolveChildName(this.name, 'chunks', name, CHUNK_NAME_REGEX);
  }

  private toChunkInput(input: BatchCreateChunkInput): ChunkInput {
    if (typeof input === 'string') {
      return { data: { stringValue: input } };
    }
    if (Array.isArray(input)) {
      const [name, data] = input;
      return { name: this.chunkName(name), data: { stringValue: data } };
    }
    return {
      name: input.name === undefined ? undefined : this.chunkName(input.name),
      data:
        typeof input.data === 'string' ? { stringValue: input.data } : input.data,
      customMetadata: input.customMetadata,
    };
  }

  /**
   * Creates a chunk holding `data`. `name` is either a full chunk name of
   * this document or a bare id, which is sanitised and prefixed.
   */
  async createChunk(
    name: string,
    data: string | ChunkData,
    options: CreateChunkOptions = {},
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<Chunk> {
    if (name.length === 0) {
      throw new InvalidArgumentError('Chunk name must be specified.');
    }
    const chunk = this.toChunkInput({ name, data, ...options });
    return Chunk.fromResource(await client.createChunk(this.name, chunk));
  }

  /**
   * Creates several chunks in one call.
   *
   * @example
   * await document.batchCreateChunks([
   *   'unnamed passage',
   *   ['intro', 'Named passage'],
   *   { name: 'outro', data: 'With metadata', customMetadata: [tag] },
   * ]);
   */
  async batchCreateChunks(
    chunks: BatchCreateChunkInput[],
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<Chunk[]> {
    const requests: CreateChunkRequest[] = chunks.map((input) => ({
      parent: this.name,
      chunk: this.toChunkInput(input),
    }));
    const response = await client.batchCreateChunks(this.name, requests);
    logger.debug(`Created ${response.chunks.length} chunks in ${this.name}.`);
    return response.chunks.map((chunk) => Chunk.fromResource(chunk));
  }

  async getChunk(
    name: string,
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<Chunk> {
    return Chunk.fromResource(await client.getChunk(name));
  }

  async listChunks(
    page: PageOptions = {},
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<ChunkPage> {
    const response = await client.listChunks(this.name, page);
    return {
      chunks: response.chunks.map((chunk) => Chunk.fromResource(chunk)),
      nextPageToken: response.nextPageToken,
    };
  }

  /** Updates `displayName` and/or `customMetadata`. */
  async update(
    updates: Record<string, unknown>,
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<this> {
    const document = {
      name: this.name,
      displayName: this.displayName,
      customMetadata: this.customMetadata,
    };
    const paths = flattenUpdatePaths(updates);
    for (const [path, value] of Object.entries(paths)) {
      switch (path) {
        case 'displayName':
          document.displayName = parseUpdateValue(z.string(), path, value);
          break;
        case 'customMetadata':
          document.customMetadata = parseUpdateValue(
            z.array(CustomMetadataSchema),
            path,
            value,
          );
          break;
        default:
          throw new InvalidArgumentError(
            `Bad update path: only \`displayName\` or \`customMetadata\` can be updated for a document. Got: \`${path}\`.`,
          );
      }
    }

    const updated = Document.fromResource(
      await client.updateDocument(document, Object.keys(paths)),
    );
    this.displayName = updated.displayName;
    this.customMetadata = updated.customMetadata;
    this.createTime = updated.createTime;
    this.updateTime = updated.updateTime;
    return this;
  }

  /**
   * Updates several chunks in one call. Each chunk is fetched first so the
   * request carries its full current state.
   */
  async batchUpdateChunks(
    updates: BatchUpdateChunksInput,
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<Chunk[]> {
    const entries = Array.isArray(updates) ? updates : Object.entries(updates);
    const requests: UpdateChunkRequest[] = [];
    for (const [name, chunkUpdates] of entries) {
      const chunk = await this.getChunk(name, client);
      requests.push(chunk.prepareUpdate(chunkUpdates));
    }
    const response = await client.batchUpdateChunks(this.name, requests);
    return response.chunks.map((chunk) => Chunk.fromResource(chunk));
  }

  async deleteChunk(
    name: string,
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<void> {
    await client.deleteChunk(name);
  }

  async batchDeleteChunks(
    names: string[],
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<void> {
    await client.batchDeleteChunks(this.name, names);
  }

  /** Semantic search over the chunks of this document. */
  async query(
    query: string,
    options: QueryOptions = {},
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<RelevantChunk[]> {
    validateResultsCount(options.resultsCount);
    const response = await client.queryDocument(this.name, {
      query,
      metadataFilters: toWireMetadataFilters(options.metadataFilters),
      resultsCount: options.resultsCount,
    });
    return toRelevantChunks(response);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      displayName: this.displayName,
      customMetadata: this.customMetadata,
      createTime: this.createTime?.toISOString(),
      updateTime: this.updateTime?.toISOString(),
    };
  }
}
