/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { InvalidArgumentError } from '../utils/errors.js';

/** Comparison operators of a metadata condition, indexed by wire code. */
export const OPERATORS = [
  'OPERATOR_UNSPECIFIED',
  'LESS',
  'LESS_EQUAL',
  'EQUAL',
  'GREATER_EQUAL',
  'GREATER',
  'NOT_EQUAL',
  'INCLUDES',
  'EXCLUDES',
] as const;

export type Operator = (typeof OPERATORS)[number];

export const CHUNK_STATES = [
  'STATE_UNSPECIFIED',
  'STATE_PENDING_PROCESSING',
  'STATE_ACTIVE',
  'STATE_FAILED',
] as const;

export type ChunkState = (typeof CHUNK_STATES)[number];

const CHUNK_STATE_CODES: Record<ChunkState, number> = {
  STATE_UNSPECIFIED: 0,
  STATE_PENDING_PROCESSING: 1,
  STATE_ACTIVE: 2,
  STATE_FAILED: 10,
};

const OPERATOR_SYMBOLS: Record<string, Operator> = {
  '<': 'LESS',
  '<=': 'LESS_EQUAL',
  '==': 'EQUAL',
  '>=': 'GREATER_EQUAL',
  '>': 'GREATER',
  '!=': 'NOT_EQUAL',
  'not in': 'EXCLUDES',
};

const OPERATOR_ALIASES = new Map<string, Operator>(
  Object.entries(OPERATOR_SYMBOLS),
);
for (const operator of OPERATORS) {
  const lower = operator.toLowerCase();
  OPERATOR_ALIASES.set(lower, operator);
  OPERATOR_ALIASES.set(
    lower.startsWith('operator_') ? lower.slice('operator_'.length) : `operator_${lower}`,
    operator,
  );
}

const STATE_ALIASES = new Map<string, ChunkState>([
  ['pending', 'STATE_PENDING_PROCESSING'],
]);
for (const state of CHUNK_STATES) {
  const lower = state.toLowerCase();
  STATE_ALIASES.set(lower, state);
  STATE_ALIASES.set(lower.slice('state_'.length), state);
  STATE_ALIASES.set(String(CHUNK_STATE_CODES[state]), state);
}

export type OperatorInput = Operator | number | string;
export type ChunkStateInput = ChunkState | number | string;

/**
 * Resolves an operator from its name (any case, with or without the
 * `operator_` prefix), its symbol (`<`, `>=`, `not in`, ...) or its wire
 * code.
 */
export function toOperator(input: OperatorInput): Operator {
  const operator =
    typeof input === 'number'
      ? Number.isInteger(input) && input >= 0
        ? OPERATORS.at(input)
        : undefined
      : OPERATOR_ALIASES.get(input.trim().toLowerCase()) ??
        (/^\d+$/.test(input) ? OPERATORS.at(Number(input)) : undefined);
  if (operator === undefined) {
    throw new InvalidArgumentError(`Unknown metadata operator: ${input}`);
  }
  return operator;
}

/**
 * Looks up a chunk state by name (any case, with or without the `state_`
 * prefix) or by wire code, so both enum encodings of the service decode.
 */
export function parseChunkState(input: ChunkStateInput): ChunkState | undefined {
  return STATE_ALIASES.get(String(input).trim().toLowerCase());
}

export const CORPUS_NAME_REGEX = /^corpora\/[^/]+$/;
export const DOCUMENT_NAME_REGEX = /^corpora\/[^/]+\/documents\/[^/]+$/;
export const CHUNK_NAME_REGEX = /^corpora\/[^/]+\/documents\/[^/]+\/chunks\/[^/]+$/;

// ASCII punctuation except the hyphen.
const DISALLOWED_ID_CHARACTERS = /[!"#$%&'()*+,./:;<=>?@[\\\]^_`{|}~]/g;

/** Strips the punctuation a resource id may not contain; hyphens stay. */
export function sanitizeResourceId(id: string): string {
  return id.replace(DISALLOWED_ID_CHARACTERS, '');
}

/**
 * Builds the name of a child resource under `parent`. A name that already
 * matches `pattern` is kept as given; a bare id is sanitised and prefixed;
 * anything else naming a `collection` resource is rejected.
 */
export function resolveChildName(
  parent: string,
  collection: 'corpora' | 'documents' | 'chunks',
  name: string,
  pattern: RegExp,
): string {
  const prefix = collection === 'corpora' ? 'corpora/' : `${parent}/${collection}/`;
  if (pattern.test(name)) {
    if (!name.startsWith(prefix)) {
      throw new InvalidArgumentError(
        `Resource name ${name} must be formatted as ${prefix}<id>.`,
      );
    }
    return name;
  }
  if (name.includes(`${collection}/`)) {
    throw new InvalidArgumentError(
      `Resource name ${name} must be formatted as ${prefix}<id>.`,
    );
  }
  const id = sanitizeResourceId(name);
  if (id.length === 0) {
    throw new InvalidArgumentError(`Resource id ${name} is empty once sanitised.`);
  }
  return `${prefix}${id}`;
}

/** A user-supplied key/value pair stored on a document or chunk. */
export interface CustomMetadata {
  key: string;
  stringValue?: string;
  stringListValue?: { values: string[] };
  numericValue?: number;
}

export interface ChunkData {
  stringValue: string;
}

export interface Condition {
  value: string | number;
  operation: OperatorInput;
}

/** Restricts a query to chunks or documents whose `key` meets every condition. */
export interface MetadataFilter {
  key: string;
  conditions: Condition[];
}

export interface WireCondition {
  stringValue?: string;
  numericValue?: number;
  operation: Operator;
}

export interface WireMetadataFilter {
  key: string;
  conditions: WireCondition[];
}

export function toWireMetadataFilters(
  filters: MetadataFilter[] | undefined,
): WireMetadataFilter[] | undefined {
  return filters?.map((filter) => ({
    key: filter.key,
    conditions: filter.conditions.map((condition) => ({
      ...(typeof condition.value === 'number'
        ? { numericValue: condition.value }
        : { stringValue: condition.value }),
      operation: toOperator(condition.operation),
    })),
  }));
}

export interface QueryOptions {
  metadataFilters?: MetadataFilter[];
  /** Between 1 and 100. */
  resultsCount?: number;
}

export const MAX_RESULTS_COUNT = 100;

export function validateResultsCount(resultsCount: number | undefined): void {
  if (
    resultsCount !== undefined &&
    (!Number.isInteger(resultsCount) ||
      resultsCount < 1 ||
      resultsCount > MAX_RESULTS_COUNT)
  ) {
    throw new InvalidArgumentError(
      `Number of results returned must be between 1 and ${MAX_RESULTS_COUNT}.`,
    );
  }
}

export interface PageOptions {
  pageSize?: number;
  pageToken?: string;
}
