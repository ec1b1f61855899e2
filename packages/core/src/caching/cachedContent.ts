/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  CachedContentUsageMetadata,
  Tool,
  ToolConfig,
} from '@google/genai';
import {
  toOptionalExpireTime,
  toOptionalTtl,
  type CacheClient,
  type CachedContentResource,
  type ExpireTimeInput,
  type TtlInput,
} from './cachingTypes.js';
import { toContent, toContents, type ContentInput } from '../core/contentTypes.js';
import { getDefaultCacheClient } from '../config/clientManager.js';
import { flattenUpdatePaths } from '../utils/flattenUpdatePaths.js';
import { decodeTime } from '../utils/timestamps.js';
import {
  InvalidArgumentError,
  MalformedResponseError,
} from '../utils/errors.js';
import { createDebugLogger } from '../utils/debugLogger.js';

const logger = createDebugLogger('CachedContent');

export interface CreateCachedContentOptions {
  displayName?: string;
  systemInstruction?: ContentInput;
  contents?: ContentInput | ContentInput[];
  tools?: Tool[];
  toolConfig?: ToolConfig;
  /** Defaults to one hour on the service side. Exclusive with `expireTime`. */
  ttl?: TtlInput;
  expireTime?: ExpireTimeInput;
}

export interface ListCachedContentOptions {
  pageSize?: number;
}

export interface CachedContentUpdates {
  ttl?: TtlInput;
  expireTime?: ExpireTimeInput;
}

function assertExclusiveExpiry(ttl: unknown, expireTime: unknown): void {
  if (ttl !== undefined && expireTime !== undefined) {
    throw new InvalidArgumentError(
      'Exclusive arguments: Please provide either `ttl` or `expireTime`, not both.',
    );
  }
}

/** A cached-content resource: contents stored once and reused by prompts. */
export class CachedContent {
  private constructor(
    readonly name: string,
    readonly model: string | undefined,
    public displayName: string | undefined,
    public usageMetadata: CachedContentUsageMetadata | undefined,
    public createTime: Date | undefined,
    public updateTime: Date | undefined,
    public expireTime: Date | undefined,
    private readonly client: CacheClient,
  ) {}

  static fromResource(
    resource: CachedContentResource,
    client: CacheClient = getDefaultCacheClient(),
  ): CachedContent {
    if (!resource.name) {
      throw new MalformedResponseError(
        'Cached content returned by the service has no name.',
      );
    }
    return new CachedContent(
      resource.name,
      resource.model,
      resource.displayName,
      resource.usageMetadata,
      decodeTime(resource.createTime),
      decodeTime(resource.updateTime),
      decodeTime(resource.expireTime),
      client,
    );
  }

  /**
   * Creates a cached-content resource for `model`. A bare model id gets the
   * `models/` prefix.
   *
   * @example
   * const cache = await CachedContent.create('gemini-1.5-flash-001', {
   *   systemInstruction: 'You are an expert on the attached report.',
   *   contents: [reportPart],
   *   ttl: 300,
   * });
   */
  static async create(
    model: string,
    options: CreateCachedContentOptions = {},
    client: CacheClient = getDefaultCacheClient(),
  ): Promise<CachedContent> {
    assertExclusiveExpiry(options.ttl, options.expireTime);
    const resource = await client.create({
      model: model.includes('/') ? model : `models/${model}`,
      config: {
        displayName: options.displayName,
        systemInstruction:
          options.systemInstruction === undefined
            ? undefined
            : toContent(options.systemInstruction),
        contents:
          options.contents === undefined
            ? undefined
            : toContents(options.contents),
        tools: options.tools,
        toolConfig: options.toolConfig,
        ttl: toOptionalTtl(options.ttl),
        expireTime: toOptionalExpireTime(options.expireTime),
      },
    });
    logger.debug(`Created ${resource.name}.`);
    return CachedContent.fromResource(resource, client);
  }

  static async get(
    name: string,
    client: CacheClient = getDefaultCacheClient(),
  ): Promise<CachedContent> {
    const fullName = name.includes('cachedContents/')
      ? name
      : `cachedContents/${name}`;
    return CachedContent.fromResource(await client.get({ name: fullName }), client);
  }

  /** Iterates over every cached content of the project, page by page. */
  static async *list(
    options: ListCachedContentOptions = {},
    client: CacheClient = getDefaultCacheClient(),
  ): AsyncGenerator<CachedContent, void, undefined> {
    const pager = await client.list({ config: { pageSize: options.pageSize } });
    for await (const resource of pager) {
      yield CachedContent.fromResource(resource, client);
    }
  }

  async delete(): Promise<void> {
    await this.client.delete({ name: this.name });
    logger.debug(`Deleted ${this.name}.`);
  }

  /**
   * Updates the expiry of this cached content. Only `ttl` or `expireTime`
   * may be given, and not both; any other path is rejected.
   */
  async update(
    updates: CachedContentUpdates & Record<string, unknown>,
  ): Promise<this> {
    for (const path of Object.keys(flattenUpdatePaths({ ...updates }))) {
      const [field] = path.split('.');
      if (field !== 'ttl' && field !== 'expireTime') {
        throw new InvalidArgumentError(
          'Bad update name: only `ttl` or `expireTime` can be updated for ' +
            `\`CachedContent\`. Got: \`${path}\` instead.`,
        );
      }
    }
    assertExclusiveExpiry(updates.ttl, updates.expireTime);
    const config = {
      ttl: toOptionalTtl(updates.ttl),
      expireTime: toOptionalExpireTime(updates.expireTime),
    };

    const resource = await this.client.update({ name: this.name, config });
    this.displayName = resource.displayName;
    this.usageMetadata = resource.usageMetadata;
    this.createTime = decodeTime(resource.createTime);
    this.updateTime = decodeTime(resource.updateTime);
    this.expireTime = decodeTime(resource.expireTime);
    return this;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      model: this.model,
      displayName: this.displayName,
      usageMetadata: this.usageMetadata,
      createTime: this.createTime?.toISOString(),
      updateTime: this.updateTime?.toISOString(),
      expireTime: this.expireTime?.toISOString(),
    };
  }
}
