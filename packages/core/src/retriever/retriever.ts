/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Corpus } from './corpus.js';
import type { RetrieverClient } from './restRetrieverClient.js';
import {
  CORPUS_NAME_REGEX,
  resolveChildName,
  type PageOptions,
} from './retrieverTypes.js';
import { getDefaultRetrieverClient } from '../config/clientManager.js';
import { InvalidArgumentError } from '../utils/errors.js';
import { createDebugLogger } from '../utils/debugLogger.js';

const logger = createDebugLogger('Retriever');

export interface CreateCorpusOptions {
  /** `corpora/<id>` or a bare id. */
  name?: string;
  displayName?: string;
}

export interface CorpusPage {
  corpora: Corpus[];
  nextPageToken?: string;
}

/**
 * Creates a corpus. Either `name` or `displayName` is required; without a
 * name the service assigns one.
 *
 * @example
 * const corpus = await createCorpus({ name: 'release-notes' });
 * const doc = await corpus.createDocument({ displayName: 'v1.0' });
 */
export async function createCorpus(
  options: CreateCorpusOptions,
  client: RetrieverClient = getDefaultRetrieverClient(),
): Promise<Corpus> {
  const { name, displayName } = options;
  if (!name && !displayName) {
    throw new InvalidArgumentError(
      'Either the corpus name or display name must be specified.',
    );
  }
  const resource = await client.createCorpus({
    name: name
      ? resolveChildName('', 'corpora', name, CORPUS_NAME_REGEX)
      : undefined,
    displayName,
  });
  logger.debug(`Created ${resource.name}.`);
  return Corpus.fromResource(resource);
}

export async function getCorpus(
  name: string,
  client: RetrieverClient = getDefaultRetrieverClient(),
): Promise<Corpus> {
  return Corpus.fromResource(
    await client.getCorpus(
      resolveChildName('', 'corpora', name, CORPUS_NAME_REGEX),
    ),
  );
}

export async function listCorpora(
  page: PageOptions = {},
  client: RetrieverClient = getDefaultRetrieverClient(),
): Promise<CorpusPage> {
  const response = await client.listCorpora(page);
  return {
    corpora: response.corpora.map((corpus) => Corpus.fromResource(corpus)),
    nextPageToken: response.nextPageToken,
  };
}

/** With `force`, the documents and chunks of the corpus are deleted too. */
export async function deleteCorpus(
  name: string,
  force?: boolean,
  client: RetrieverClient = getDefaultRetrieverClient(),
): Promise<void> {
  await client.deleteCorpus(
    resolveChildName('', 'corpora', name, CORPUS_NAME_REGEX),
    force,
  );
  logger.debug(`Deleted ${name}.`);
}
