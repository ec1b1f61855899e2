/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'node:fs';
import path from 'node:path';
import * as dotenv from 'dotenv';

/** Environment variables consulted for an API key, in order. */
export const API_KEY_ENV_VARS = ['GOOGLE_API_KEY', 'GEMINI_API_KEY'] as const;

export function getEnvFilePath(cwd: string = process.cwd()): string {
  return path.join(cwd, '.env');
}

/** Variables defined in the `.env` file of `cwd`, or `{}` without one. */
export function readEnvFile(cwd?: string): Record<string, string> {
  const envFilePath = getEnvFilePath(cwd);
  if (!fs.existsSync(envFilePath)) {
    return {};
  }
  return dotenv.parse(fs.readFileSync(envFilePath, 'utf-8'));
}

function firstKey(source: Record<string, string | undefined>): string | undefined {
  for (const name of API_KEY_ENV_VARS) {
    const value = source[name];
    if (value) {
      return value;
    }
  }
  return undefined;
}

/**
 * Looks up an API key in the process environment first, then in the `.env`
 * file of the working directory. The file is parsed, not loaded, so
 * `process.env` is left untouched.
 */
export function resolveApiKeyFromEnvironment(cwd?: string): string | undefined {
  return firstKey(process.env) ?? firstKey(readEnvFile(cwd));
}
