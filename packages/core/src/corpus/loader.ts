import { readFileSync } from 'node:fs';

import { Ajv, type ErrorObject } from 'ajv';
import {
  describeError,
  isPayloadContext,
  type PayloadContext,
} from '@sinkbench/shared';

import { ErrorCode } from '../errors/codes.js';
import { didYouMean } from '../errors/suggestions.js';
import { isMarkupContext } from '../harness/context.js';
import { CorpusError } from '../types/errors.js';
import {
  legacyVectorListSchema,
  vectorFileSchema,
  type RawVector,
  type VectorFileDocument,
} from './schema.js';
import type { ExpectedTag, Vector } from './types.js';

const ajv = new Ajv();
const validateLegacyList = ajv.compile<RawVector[]>(legacyVectorListSchema);
const validateVectorFile = ajv.compile<VectorFileDocument>(vectorFileSchema);

const EXPECTED_TAG_RE = /^([a-z][a-z0-9-]*)(?:\[([^\]]*)\])?$/i;

function describeAjvError(errors: ErrorObject[] | null | undefined): string {
  const [first] = errors ?? [];
  if (!first) return 'does not match the vector file schema';
  return `${first.instancePath || '/'} ${first.message ?? 'is invalid'}`;
}

export function parseExpectedTag(raw: string, vectorId: string): ExpectedTag {
  const match = EXPECTED_TAG_RE.exec(raw.trim());
  const name = match?.[1];
  if (!match || !name) {
    throw new CorpusError({
      message: `Vector ${vectorId}: invalid expected tag ${JSON.stringify(raw)}`,
      context: { vectorId },
    });
  }
  const inner = match[2];
  if (inner === undefined) return { tag: name.toLowerCase(), attrs: [] };
  const attrs = inner
    .split(',')
    .map((attr) => attr.trim().toLowerCase())
    .filter((attr) => attr.length > 0);
  if (attrs.length === 0) {
    throw new CorpusError({
      message: `Vector ${vectorId}: expected tag ${JSON.stringify(raw)} must not use empty brackets`,
      context: { vectorId },
    });
  }
  return { tag: name.toLowerCase(), attrs: [...new Set(attrs)].sort() };
}

function contextsOf(raw: RawVector): PayloadContext[] {
  const declared = raw.payload_context ?? 'html';
  const list = Array.isArray(declared) ? declared : [declared];
  // The schema already restricts values; this narrows them.
  return list.filter(isPayloadContext);
}

function buildVectors(
  raw: RawVector,
  ignoreExpectedTags: boolean,
  file: string
): Vector[] {
  const expectedTags =
    ignoreExpectedTags || raw.expected_tags === undefined || raw.expected_tags === null
      ? null
      : Object.freeze(raw.expected_tags.map((tag) => Object.freeze(parseExpectedTag(tag, raw.id))));

  return contextsOf(raw).map((payloadContext) => {
    if (expectedTags !== null && !isMarkupContext(payloadContext)) {
      throw new CorpusError({
        message: `Vector ${raw.id}: expected_tags is not allowed for payload_context ${payloadContext}`,
        context: { vectorId: raw.id, payloadContext, file },
      });
    }
    return Object.freeze({
      id: raw.id,
      description: raw.description,
      payloadHtml: raw.payload_html,
      payloadContext,
      expectedTags,
    });
  });
}

/**
 * Parses one vector file's JSON value: either a bare list of vectors or a
 * `sinkbench.vectorfile.v1` document. A list-valued payload_context expands to
 * one vector per context.
 */
export function parseVectorFile(data: unknown, file = '<inline>'): Vector[] {
  let rawVectors: RawVector[];
  let ignoreExpectedTags = false;

  if (Array.isArray(data)) {
    if (!validateLegacyList(data)) {
      throw new CorpusError({
        message: `Invalid vector list in ${file}: ${describeAjvError(validateLegacyList.errors)}`,
        context: { file },
      });
    }
    rawVectors = data;
  } else if (data !== null && typeof data === 'object') {
    if (!validateVectorFile(data)) {
      throw new CorpusError({
        message: `Invalid vector file ${file}: ${describeAjvError(validateVectorFile.errors)}`,
        context: { file },
      });
    }
    rawVectors = data.vectors;
    ignoreExpectedTags = data.options?.expected_tags === 'ignore';
  } else {
    throw new CorpusError({
      message: `Vector file must contain a JSON list, or an object with 'vectors': ${file}`,
      errorCode: ErrorCode.CORPUS_PARSE_FAILED,
      context: { file },
    });
  }

  return rawVectors.flatMap((raw) => buildVectors(raw, ignoreExpectedTags, file));
}

function assertUnique(vectors: readonly Vector[]): void {
  const seen = new Set<string>();
  for (const vector of vectors) {
    const key = `${vector.id}@${vector.payloadContext}`;
    if (seen.has(key)) {
      throw new CorpusError({
        message: `Duplicate vector id+context: ${key}`,
        errorCode: ErrorCode.DUPLICATE_VECTOR,
        context: { vectorId: vector.id, payloadContext: vector.payloadContext },
      });
    }
    seen.add(key);
  }
}

function readJson(file: string): unknown {
  let text: string;
  try {
    text = readFileSync(file, 'utf8');
  } catch (error) {
    throw new CorpusError({
      message: `Cannot read vector file ${file}: ${describeError(error)}`,
      errorCode: ErrorCode.CORPUS_PARSE_FAILED,
      context: { file },
      cause: error,
    });
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new CorpusError({
      message: `Vector file ${file} is not valid JSON: ${describeError(error)}`,
      errorCode: ErrorCode.CORPUS_PARSE_FAILED,
      context: { file },
      cause: error,
    });
  }
}

/** Loads and concatenates vector files; (id, context) pairs must be unique across all of them. */
export function loadVectors(paths: readonly string[]): Vector[] {
  const vectors = paths.flatMap((file) => parseVectorFile(readJson(file), file));
  assertUnique(vectors);
  return vectors;
}

/** Splits `--ids a,b --ids c` style arguments into a de-duplicated id list. */
export function normalizeIdArgs(values: readonly string[]): string[] {
  const ids = values
    .flatMap((value) => value.split(','))
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  return [...new Set(ids)];
}

/** Keeps corpus order; every requested id must exist. */
export function selectVectorsById(
  vectors: readonly Vector[],
  ids: readonly string[]
): Vector[] {
  const wanted = new Set(ids);
  const known = new Set(vectors.map((vector) => vector.id));
  const missing = ids.filter((id) => !known.has(id));
  if (missing.length > 0) {
    const close = didYouMean(missing[0] ?? '', [...known]);
    throw new CorpusError({
      message: `Unknown vector id(s): ${missing.join(', ')}`,
      errorCode: ErrorCode.UNKNOWN_VECTOR_ID,
      context: {
        suggestion:
          close.length > 0
            ? `Did you mean: ${close.join(', ')}?`
            : 'Check the ids against the loaded vector files',
      },
    });
  }
  return vectors.filter((vector) => wanted.has(vector.id));
}
