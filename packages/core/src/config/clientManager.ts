/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { GoogleGenAI } from '@google/genai';
import type { GoogleAuthOptions } from 'google-auth-library';
import { z } from 'zod';
import { resolveApiKeyFromEnvironment } from './environment.js';
import type { GenerativeClient } from '../core/generate.js';
import type { CacheClient } from '../caching/cachingTypes.js';
import {
  RestRetrieverClient,
  type RetrieverClient,
} from '../retriever/restRetrieverClient.js';
import { ConfigurationError } from '../utils/errors.js';
import { createDebugLogger } from '../utils/debugLogger.js';

const logger = createDebugLogger('ClientManager');

export const SDK_VERSION = '0.1.0';
export const USER_AGENT = `genlang-sdk/${SDK_VERSION}`;

const ConfigureOptionsSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    credentials: z
      .custom<GoogleAuthOptions>(
        (value) => typeof value === 'object' && value !== null,
        { message: 'credentials must be a GoogleAuthOptions object' },
      )
      .optional(),
    vertexai: z.boolean().optional(),
    project: z.string().optional(),
    location: z.string().optional(),
    apiVersion: z.string().optional(),
    clientOptions: z
      .object({
        apiKey: z.string().min(1).optional(),
        apiEndpoint: z.string().url().optional(),
      })
      .strict()
      .optional(),
    clientInfo: z.object({ userAgent: z.string().optional() }).optional(),
    defaultMetadata: z.array(z.tuple([z.string(), z.string()])).optional(),
  })
  .strict();

export type ConfigureOptions = z.input<typeof ConfigureOptionsSchema>;

/** Client configuration after defaults and the environment were applied. */
export interface ClientConfig {
  apiKey?: string;
  apiEndpoint?: string;
  credentials?: GoogleAuthOptions;
  vertexai?: boolean;
  project?: string;
  location?: string;
  apiVersion?: string;
  userAgent: string;
  defaultMetadata: Array<[string, string]>;
}

function resolveConfig(options: ConfigureOptions): ClientConfig {
  const parsed = ConfigureOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid client configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
      { cause: parsed.error },
    );
  }
  const { apiKey, clientOptions, clientInfo, defaultMetadata, ...rest } =
    parsed.data;
  if (apiKey !== undefined && clientOptions?.apiKey !== undefined) {
    throw new ConfigurationError(
      "You can't set both `apiKey` and `clientOptions.apiKey`.",
    );
  }

  const callerAgent = clientInfo?.userAgent;
  return {
    ...rest,
    apiKey: apiKey ?? clientOptions?.apiKey ?? resolveApiKeyFromEnvironment(),
    apiEndpoint: clientOptions?.apiEndpoint,
    userAgent: callerAgent ? `${callerAgent} ${USER_AGENT}` : USER_AGENT,
    defaultMetadata: defaultMetadata ?? [],
  };
}

/**
 * Holds the default client configuration and the clients built from it.
 * Clients are created on first use and dropped whenever the configuration
 * changes.
 */
export class ClientManager {
  private config?: ClientConfig;
  private genAI?: GoogleGenAI;
  private retrieverClient?: RetrieverClient;

  configure(options: ConfigureOptions = {}): void {
    this.config = resolveConfig(options);
    this.genAI = undefined;
    this.retrieverClient = undefined;
    logger.debug(
      `Configured clients (api key ${this.config.apiKey ? 'set' : 'not set'}, ` +
        `${this.config.defaultMetadata.length} metadata pairs).`,
    );
  }

  /** The current configuration, configuring from the environment first if needed. */
  getConfig(): ClientConfig {
    this.config ??= resolveConfig({});
    return this.config;
  }

  /** Headers sent with every request: user agent plus default metadata. */
  getRequestHeaders(): Record<string, string> {
    const config = this.getConfig();
    return {
      ...Object.fromEntries(config.defaultMetadata),
      'x-goog-api-client': config.userAgent,
    };
  }

  private getGenAI(): GoogleGenAI {
    if (!this.genAI) {
      const config = this.getConfig();
      this.genAI = new GoogleGenAI({
        apiKey: config.apiKey,
        vertexai: config.vertexai,
        project: config.project,
        location: config.location,
        apiVersion: config.apiVersion,
        googleAuthOptions: config.credentials,
        httpOptions: {
          baseUrl: config.apiEndpoint,
          headers: this.getRequestHeaders(),
        },
      });
      logger.debug('Created generative-language client.');
    }
    return this.genAI;
  }

  getGenerativeClient(): GenerativeClient {
    return this.getGenAI().models;
  }

  getCacheClient(): CacheClient {
    return this.getGenAI().caches;
  }

  getRetrieverClient(): RetrieverClient {
    if (!this.retrieverClient) {
      const config = this.getConfig();
      this.retrieverClient = new RestRetrieverClient({
        apiKey: config.apiKey,
        apiEndpoint: config.apiEndpoint,
        apiVersion: config.apiVersion,
        credentials: config.credentials,
        headers: this.getRequestHeaders(),
      });
      logger.debug('Created retriever client.');
    }
    return this.retrieverClient;
  }
}

const clientManager = new ClientManager();

/**
 * Captures the default client configuration used by every module-level
 * operation. Without an explicit key, `GOOGLE_API_KEY`, `GEMINI_API_KEY` and
 * then the `.env` file of the working directory are consulted.
 *
 * @example
 * configure({ apiKey: 'test-key', defaultMetadata: [['x-team', 'search']] });
 */
export function configure(options: ConfigureOptions = {}): void {
  clientManager.configure(options);
}

export function getClientManager(): ClientManager {
  return clientManager;
}

export function getDefaultGenerativeClient(): GenerativeClient {
  return clientManager.getGenerativeClient();
}

export function getDefaultCacheClient(): CacheClient {
  return clientManager.getCacheClient();
}

export function getDefaultRetrieverClient(): RetrieverClient {
  return clientManager.getRetrieverClient();
}
