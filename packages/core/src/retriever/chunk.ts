/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import type {
  RetrieverClient,
  UpdateChunkRequest,
} from './restRetrieverClient.js';
import {
  CustomMetadataSchema,
  parseUpdateValue,
  type ChunkResource,
} from './retrieverSchemas.js';
import type { ChunkData, ChunkState, CustomMetadata } from './retrieverTypes.js';
import { getDefaultRetrieverClient } from '../config/clientManager.js';
import { flattenUpdatePaths } from '../utils/flattenUpdatePaths.js';
import { decodeTime } from '../utils/timestamps.js';
import { InvalidArgumentError } from '../utils/errors.js';

/** A passage of a `Document`: the unit that queries return. */
export class Chunk {
  private constructor(
    readonly name: string,
    public data: ChunkData,
    public customMetadata: CustomMetadata[],
    public state: ChunkState,
    public createTime: Date | undefined,
    public updateTime: Date | undefined,
  ) {}

  static fromResource(resource: ChunkResource): Chunk {
    return new Chunk(
      resource.name,
      { stringValue: resource.data?.stringValue ?? '' },
      resource.customMetadata ?? [],
      resource.state ?? 'STATE_UNSPECIFIED',
      decodeTime(resource.createTime),
      decodeTime(resource.updateTime),
    );
  }

  /**
   * Builds the update request for `updates` without sending it. Only
   * `data.stringValue` and `customMetadata` can be updated.
   */
  prepareUpdate(updates: Record<string, unknown>): UpdateChunkRequest {
    const chunk = {
      name: this.name,
      data: { ...this.data },
      customMetadata: this.customMetadata,
    };
    const paths = flattenUpdatePaths(updates);
    for (const [path, value] of Object.entries(paths)) {
      switch (path) {
        case 'data.stringValue':
          chunk.data.stringValue = parseUpdateValue(z.string(), path, value);
          break;
        case 'customMetadata':
          chunk.customMetadata = parseUpdateValue(
            z.array(CustomMetadataSchema),
            path,
            value,
          );
          break;
        default:
          throw new InvalidArgumentError(
            `Bad update path: only \`data.stringValue\` or \`customMetadata\` can be updated for a chunk. Got: \`${path}\`.`,
          );
      }
    }
    return { chunk, updateMask: Object.keys(paths) };
  }

  /** Applies a resource returned by the service to this instance. */
  assign(resource: ChunkResource): void {
    const updated = Chunk.fromResource(resource);
    this.data = updated.data;
    this.customMetadata = updated.customMetadata;
    this.state = updated.state;
    this.createTime = updated.createTime;
    this.updateTime = updated.updateTime;
  }

  /**
   * Updates fields of this chunk, e.g.
   * `chunk.update({ data: { stringValue: 'revised text' } })`.
   */
  async update(
    updates: Record<string, unknown>,
    client: RetrieverClient = getDefaultRetrieverClient(),
  ): Promise<this> {
    const { chunk, updateMask } = this.prepareUpdate(updates);
    this.assign(await client.updateChunk(chunk, updateMask));
    return this;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      data: this.data,
      customMetadata: this.customMetadata,
      state: this.state,
      createTime: this.createTime?.toISOString(),
      updateTime: this.updateTime?.toISOString(),
    };
  }
}
