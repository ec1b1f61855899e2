/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  createCorpus,
  deleteCorpus,
  getCorpus,
  listCorpora,
} from './retriever.js';
import { getDefaultRetrieverClient } from '../config/clientManager.js';
import {
  createMockRetrieverClient,
  type MockRetrieverClient,
} from '../test-utils/retrieverClient.js';

vi.mock('../config/clientManager.js', () => ({
  getDefaultRetrieverClient: vi.fn(),
}));

describe('retriever', () => {
  let client: MockRetrieverClient;

  beforeEach(() => {
    vi.resetAllMocks();
    client = createMockRetrieverClient();
    vi.mocked(getDefaultRetrieverClient).mockReturnValue(client);
  });

  describe('createCorpus', () => {
    it('uses the configured client by default', async () => {
      client.createCorpus.mockResolvedValue({
        name: 'corpora/release-notes',
        displayName: 'Release notes',
      });

      const corpus = await createCorpus({
        name: 'release-notes',
        displayName: 'Release notes',
      });

      expect(getDefaultRetrieverClient).toHaveBeenCalledTimes(1);
      expect(client.createCorpus).toHaveBeenCalledWith({
        name: 'corpora/release-notes',
        displayName: 'Release notes',
      });
      expect(corpus.name).toBe('corpora/release-notes');
      expect(corpus.displayName).toBe('Release notes');
    });

    it('requires a name or a display name', async () => {
      await expect(createCorpus({}, client)).rejects.toThrow(
        'Either the corpus name or display name must be specified.',
      );
    });

    it('rejects a name from another collection', async () => {
      await expect(
        createCorpus({ name: 'corpora/c1/documents/d1' }, client),
      ).rejects.toThrow(
        'Resource name corpora/c1/documents/d1 must be formatted as corpora/<id>.',
      );
    });
  });

  it('gets a corpus by bare id', async () => {
    client.getCorpus.mockResolvedValue({ name: 'corpora/handbook' });

    const corpus = await getCorpus('handbook', client);

    expect(client.getCorpus).toHaveBeenCalledWith('corpora/handbook');
    expect(corpus.name).toBe('corpora/handbook');
    expect(getDefaultRetrieverClient).not.toHaveBeenCalled();
  });

  it('lists corpora', async () => {
    client.listCorpora.mockResolvedValue({
      corpora: [{ name: 'corpora/a' }, { name: 'corpora/b' }],
      nextPageToken: 'more',
    });

    const page = await listCorpora({ pageSize: 2 }, client);

    expect(client.listCorpora).toHaveBeenCalledWith({ pageSize: 2 });
    expect(page.corpora.map((corpus) => corpus.name)).toEqual([
      'corpora/a',
      'corpora/b',
    ]);
    expect(page.nextPageToken).toBe('more');
  });

  it('deletes a corpus with force', async () => {
    client.deleteCorpus.mockResolvedValue(undefined);

    await deleteCorpus('corpora/handbook', true, client);

    expect(client.deleteCorpus).toHaveBeenCalledWith('corpora/handbook', true);
  });
});
