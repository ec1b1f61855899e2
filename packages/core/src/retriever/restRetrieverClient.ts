/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { GoogleAuth, type GoogleAuthOptions } from 'google-auth-library';
import type { z } from 'zod';
import {
  BatchChunksResponseSchema,
  ChunkResourceSchema,
  CorpusResourceSchema,
  DocumentResourceSchema,
  EmptyResponseSchema,
  ListChunksResponseSchema,
  ListCorporaResponseSchema,
  ListDocumentsResponseSchema,
  QueryResponseSchema,
  ServiceErrorSchema,
  type BatchChunksResponse,
  type ChunkResource,
  type CorpusResource,
  type DocumentResource,
  type ListChunksResponse,
  type ListCorporaResponse,
  type ListDocumentsResponse,
  type QueryResponse,
} from './retrieverSchemas.js';
import type {
  ChunkData,
  CustomMetadata,
  PageOptions,
  WireMetadataFilter,
} from './retrieverTypes.js';
import {
  MalformedResponseError,
  RetrieverRequestError,
} from '../utils/errors.js';
import { createDebugLogger } from '../utils/debugLogger.js';

const logger = createDebugLogger('RetrieverClient');

export const DEFAULT_API_ENDPOINT = 'https://generativelanguage.googleapis.com';
export const DEFAULT_API_VERSION = 'v1beta';

const RETRIEVER_SCOPES = [
  'https://www.googleapis.com/auth/cloud-platform',
  'https://www.googleapis.com/auth/generative-language.retriever',
];

export interface CorpusInput {
  name?: string;
  displayName?: string;
}

export interface DocumentInput {
  name?: string;
  displayName?: string;
  customMetadata?: CustomMetadata[];
}

export interface ChunkInput {
  name?: string;
  data: ChunkData;
  customMetadata?: CustomMetadata[];
}

export interface CreateChunkRequest {
  parent: string;
  chunk: ChunkInput;
}

export interface UpdateChunkRequest {
  chunk: ChunkInput & { name: string };
  updateMask: string[];
}

export interface QueryRequest {
  query: string;
  metadataFilters?: WireMetadataFilter[];
  resultsCount?: number;
}

/** One method per call of the retriever service. */
export interface RetrieverClient {
  createCorpus(corpus: CorpusInput): Promise<CorpusResource>;
  getCorpus(name: string): Promise<CorpusResource>;
  listCorpora(page?: PageOptions): Promise<ListCorporaResponse>;
  updateCorpus(
    corpus: CorpusInput & { name: string },
    updateMask: string[],
  ): Promise<CorpusResource>;
  deleteCorpus(name: string, force?: boolean): Promise<void>;
  queryCorpus(name: string, request: QueryRequest): Promise<QueryResponse>;

  createDocument(parent: string, document: DocumentInput): Promise<DocumentResource>;
  getDocument(name: string): Promise<DocumentResource>;
  listDocuments(parent: string, page?: PageOptions): Promise<ListDocumentsResponse>;
  updateDocument(
    document: DocumentInput & { name: string },
    updateMask: string[],
  ): Promise<DocumentResource>;
  deleteDocument(name: string, force?: boolean): Promise<void>;
  queryDocument(name: string, request: QueryRequest): Promise<QueryResponse>;

  createChunk(parent: string, chunk: ChunkInput): Promise<ChunkResource>;
  batchCreateChunks(
    parent: string,
    requests: CreateChunkRequest[],
  ): Promise<BatchChunksResponse>;
  getChunk(name: string): Promise<ChunkResource>;
  listChunks(parent: string, page?: PageOptions): Promise<ListChunksResponse>;
  updateChunk(
    chunk: ChunkInput & { name: string },
    updateMask: string[],
  ): Promise<ChunkResource>;
  batchUpdateChunks(
    parent: string,
    requests: UpdateChunkRequest[],
  ): Promise<BatchChunksResponse>;
  deleteChunk(name: string): Promise<void>;
  batchDeleteChunks(parent: string, names: string[]): Promise<void>;
}

export interface RestRetrieverClientOptions {
  apiKey?: string;
  apiEndpoint?: string;
  apiVersion?: string;
  /** Used for bearer auth when no API key is set. */
  credentials?: GoogleAuthOptions;
  /** Sent with every request. */
  headers?: Record<string, string>;
}

type QueryParams = Record<string, string | number | boolean | undefined>;

interface RequestOptions {
  query?: QueryParams;
  body?: unknown;
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function serviceMessage(payload: unknown, fallback: string): string {
  const parsed = ServiceErrorSchema.safeParse(payload);
  return parsed.success ? parsed.data.error.message : fallback;
}

/** Calls the retriever REST surface with `fetch`. */
export class RestRetrieverClient implements RetrieverClient {
  private readonly baseUrl: string;
  private auth?: GoogleAuth;

  constructor(private readonly options: RestRetrieverClientOptions = {}) {
    const endpoint = (options.apiEndpoint ?? DEFAULT_API_ENDPOINT).replace(
      /\/+$/,
      '',
    );
    this.baseUrl = `${endpoint}/${options.apiVersion ?? DEFAULT_API_VERSION}`;
  }

  private async authHeaders(): Promise<Record<string, string>> {
    if (this.options.apiKey) {
      return { 'x-goog-api-key': this.options.apiKey };
    }
    this.auth ??= new GoogleAuth({
      scopes: RETRIEVER_SCOPES,
      ...this.options.credentials,
    });
    return { ...(await this.auth.getRequestHeaders()) };
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST' | 'PATCH' | 'DELETE',
    path: string,
    schema: S,
    { query = {}, body }: RequestOptions = {},
  ): Promise<z.output<S>> {
    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    logger.debug(`${method} ${url.pathname}${url.search}`);
    const response = await fetch(url, {
      method,
      headers: {
        'Content-Type': 'application/json',
        ...this.options.headers,
        ...(await this.authHeaders()),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const payload = parseBody(await response.text());

    if (!response.ok) {
      throw new RetrieverRequestError(
        response.status,
        method,
        path,
        serviceMessage(payload, response.statusText),
      );
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `Unexpected response body for ${method} ${path}.`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  async createCorpus(corpus: CorpusInput): Promise<CorpusResource> {
    return this.request('POST', 'corpora', CorpusResourceSchema, { body: corpus });
  }

  async getCorpus(name: string): Promise<CorpusResource> {
    return this.request('GET', name, CorpusResourceSchema);
  }

  async listCorpora(page: PageOptions = {}): Promise<ListCorporaResponse> {
    return this.request('GET', 'corpora', ListCorporaResponseSchema, {
      query: { ...page },
    });
  }

  async updateCorpus(
    corpus: CorpusInput & { name: string },
    updateMask: string[],
  ): Promise<CorpusResource> {
    return this.request('PATCH', corpus.name, CorpusResourceSchema, {
      query: { updateMask: updateMask.join(',') },
      body: corpus,
    });
  }

  async deleteCorpus(name: string, force?: boolean): Promise<void> {
    await this.request('DELETE', name, EmptyResponseSchema, { query: { force } });
  }

  async queryCorpus(name: string, request: QueryRequest): Promise<QueryResponse> {
    return this.request('POST', `${name}:query`, QueryResponseSchema, {
      body: request,
    });
  }

  async createDocument(
    parent: string,
    document: DocumentInput,
  ): Promise<DocumentResource> {
    return this.request('POST', `${parent}/documents`, DocumentResourceSchema, {
      body: document,
    });
  }

  async getDocument(name: string): Promise<DocumentResource> {
    return this.request('GET', name, DocumentResourceSchema);
  }

  async listDocuments(
    parent: string,
    page: PageOptions = {},
  ): Promise<ListDocumentsResponse> {
    return this.request('GET', `${parent}/documents`, ListDocumentsResponseSchema, {
      query: { ...page },
    });
  }

  async updateDocument(
    document: DocumentInput & { name: string },
    updateMask: string[],
  ): Promise<DocumentResource> {
    return this.request('PATCH', document.name, DocumentResourceSchema, {
      query: { updateMask: updateMask.join(',') },
      body: document,
    });
  }

  async deleteDocument(name: string, force?: boolean): Promise<void> {
    await this.request('DELETE', name, EmptyResponseSchema, { query: { force } });
  }

  async queryDocument(name: string, request: QueryRequest): Promise<QueryResponse> {
    return this.request('POST', `${name}:query`, QueryResponseSchema, {
      body: request,
    });
  }

  async createChunk(parent: string, chunk: ChunkInput): Promise<ChunkResource> {
    return this.request('POST', `${parent}/chunks`, ChunkResourceSchema, {
      body: chunk,
    });
  }

  async batchCreateChunks(
    parent: string,
    requests: CreateChunkRequest[],
  ): Promise<BatchChunksResponse> {
    return this.request(
      'POST',
      `${parent}/chunks:batchCreate`,
      BatchChunksResponseSchema,
      { body: { requests } },
    );
  }

  async getChunk(name: string): Promise<ChunkResource> {
    return this.request('GET', name, ChunkResourceSchema);
  }

  async listChunks(
    parent: string,
    page: PageOptions = {},
  ): Promise<ListChunksResponse> {
    return this.request('GET', `${parent}/chunks`, ListChunksResponseSchema, {
      query: { ...page },
    });
  }

  async updateChunk(
    chunk: ChunkInput & { name: string },
    updateMask: string[],
  ): Promise<ChunkResource> {
    return this.request('PATCH', chunk.name, ChunkResourceSchema, {
      query: { updateMask: updateMask.join(',') },
      body: chunk,
    });
  }

  async batchUpdateChunks(
    parent: string,
    requests: UpdateChunkRequest[],
  ): Promise<BatchChunksResponse> {
    return this.request(
      'POST',
      `${parent}/chunks:batchUpdate`,
      BatchChunksResponseSchema,
      {
        body: {
          requests: requests.map(({ chunk, updateMask }) => ({
            chunk,
            updateMask: updateMask.join(','),
          })),
        },
      },
    );
  }

  async deleteChunk(name: string): Promise<void> {
    await this.request('DELETE', name, EmptyResponseSchema);
  }

  async batchDeleteChunks(parent: string, names: string[]): Promise<void> {
    await this.request('POST', `${parent}/chunks:batchDelete`, EmptyResponseSchema, {
      body: { requests: names.map((name) => ({ name })) },
    });
  }
}
