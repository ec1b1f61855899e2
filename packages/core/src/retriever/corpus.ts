/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { Document, toRelevantChunks, type RelevantChunk } from './document.js';
import type { RetrieverClient } from './restRetrieverClient.js';
import { parseUpdateValue, type CorpusResource } from './retrieverSchemas.js';
import {
  DOCUMENT_NAME_REGEX,
  resolveChildName,
  toWireMetadataFilters,
  validateResultsCount,
  type CustomMetadata,
  type PageOptions,
  type QueryOptions,
} from './retrieverTypes.js';
import { getDefaultRetrieverClient } from '../config/clientManager.js';
import { flattenUpdatePaths } from '../utils/flattenUpdatePaths.js';
import { decodeTime } from '../utils/timestamps.js';
import { InvalidArgumentError } from '../utils/errors.js';

export interface CreateDocumentOptions {
  /** A full document name of this corpus, or a bare id. */
  name?: string;
  displayName?: string;
  customMetadata?: CustomMetadata[];
}

export interface DocumentPage {
  documents: Document[];
  nextPageToken?: string;
}

/** A `Corpus` is a collection of `Document`s. */
export class Corpus {
  private constructor(
    readonly name: string,
    public displayName: string | undefined,
    public createTime: Date | undefined,
    public updateTime: Date | undefined,
  ) {}

  static fromResource(resource: CorpusResource): Corpus {
    return new Corpus(
      resource.name,
      resource.displayName,
      decodeTime(resource.createTime),
      decodeTime(resource.updateTime),
    );
  }

  /**
   * Creates a document in this corpus. Either `name` or `displayName` is
   * required; without a name the service assigns one.
   */
  async createDocument(
    options: CreateDocumentOptions,
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<Document> {
    const { name, displayName, customMetadata } = options;
    if (!name && !displayName) {
      throw new InvalidArgumentError(
        'Either the document name or display name must be specified.',
      );
    }
    const resource = await client.createDocument(this.name, {
      name: name
        ? resolveChildName(this.name, 'documents', name, DOCUMENT_NAME_REGEX)
        : undefined,
      displayName,
      customMetadata,
    });
    return Document.fromResource(resource);
  }

  async getDocument(
    name: string,
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<Document> {
    return Document.fromResource(await client.getDocument(name));
  }

  /** Updates the `displayName` of this corpus. */
  async update(
    updates: Record<string, unknown>,
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<this> {
    const corpus = { name: this.name, displayName: this.displayName };
    const paths = flattenUpdatePaths(updates);
    for (const [path, value] of Object.entries(paths)) {
      if (path !== 'displayName') {
        throw new InvalidArgumentError(
          `Bad update path: only \`displayName\` can be updated for a corpus. Got: \`${path}\`.`,
        );
      }
      corpus.displayName = parseUpdateValue(z.string(), path, value);
    }

    const updated = Corpus.fromResource(
      await client.updateCorpus(corpus, Object.keys(paths)),
    );
    this.displayName = updated.displayName;
    this.createTime = updated.createTime;
    this.updateTime = updated.updateTime;
    return this;
  }

  /** With `force`, the chunks of the document are deleted too. */
  async deleteDocument(
    name: string,
    force?: boolean,
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<void> {
    await client.deleteDocument(name, force);
  }

  async listDocuments(
    page: PageOptions = {},
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<DocumentPage> {
    const response = await client.listDocuments(this.name, page);
    return {
      documents: response.documents.map((document) =>
        Document.fromResource(document),
      ),
      nextPageToken: response.nextPageToken,
    };
  }

  /** Semantic search over every document of this corpus. */
  async query(
    query: string,
    options: QueryOptions = {},
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<RelevantChunk[]> {
    validateResultsCount(options.resultsCount);
    const response = await client.queryCorpus(this.name, {
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
      createTime: this.createTime?.toISOString(),
      updateTime: this.updateTime?.toISOString(),
    };
  }
}
