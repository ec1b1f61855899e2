/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Configuration
export * from './config/clientManager.js';
export * from './config/environment.js';

// Content generation
export * from './core/responseMerger.js';
export * from './core/baseResponseAccumulator.js';
export * from './core/responseAccumulator.js';
export * from './core/asyncResponseAccumulator.js';
export * from './core/contentTypes.js';
export * from './core/generate.js';

// Context caching
export * from './caching/cachingTypes.js';
export * from './caching/cachedContent.js';

// Semantic retrieval
export * from './retriever/retrieverTypes.js';
export type {
  BatchChunksResponse,
  ChunkResource,
  CorpusResource,
  DocumentResource,
  ListChunksResponse,
  ListCorporaResponse,
  ListDocumentsResponse,
  QueryResponse,
} from './retriever/retrieverSchemas.js';
export * from './retriever/restRetrieverClient.js';
export * from './retriever/chunk.js';
export * from './retriever/document.js';
export * from './retriever/corpus.js';
export * from './retriever/retriever.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/debugLogger.js';
