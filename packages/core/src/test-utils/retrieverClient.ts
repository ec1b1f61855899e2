/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { vi, type Mock } from 'vitest';
import type { RetrieverClient } from '../retriever/restRetrieverClient.js';

export type MockRetrieverClient = {
  [K in keyof RetrieverClient]: Mock<RetrieverClient[K]>;
};

export function createMockRetrieverClient(): MockRetrieverClient {
  return {
    createCorpus: vi.fn<RetrieverClient['createCorpus']>(),
    getCorpus: vi.fn<RetrieverClient['getCorpus']>(),
    listCorpora: vi.fn<RetrieverClient['listCorpora']>(),
    updateCorpus: vi.fn<RetrieverClient['updateCorpus']>(),
    deleteCorpus: vi.fn<RetrieverClient['deleteCorpus']>(),
    queryCorpus: vi.fn<RetrieverClient['queryCorpus']>(),
    createDocument: vi.fn<RetrieverClient['createDocument']>(),
    getDocument: vi.fn<RetrieverClient['getDocument']>(),
    listDocuments: vi.fn<RetrieverClient['listDocuments']>(),
    updateDocument: vi.fn<RetrieverClient['updateDocument']>(),
    deleteDocument: vi.fn<RetrieverClient['deleteDocument']>(),
    queryDocument: vi.fn<RetrieverClient['queryDocument']>(),
    createChunk: vi.fn<RetrieverClient['createChunk']>(),
    batchCreateChunks: vi.fn<RetrieverClient['batchCreateChunks']>(),
    getChunk: vi.fn<RetrieverClient['getChunk']>(),
    listChunks: vi.fn<RetrieverClient['listChunks']>(),
    updateChunk: vi.fn<RetrieverClient['updateChunk']>(),
    batchUpdateChunks: vi.fn<RetrieverClient['batchUpdateChunks']>(),
    deleteChunk: vi.fn<RetrieverClient['deleteChunk']>(),
    batchDeleteChunks: vi.fn<RetrieverClient['batchDeleteChunks']>(),
  };
}
