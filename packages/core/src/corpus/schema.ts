import { PAYLOAD_CONTEXTS } from '@sinkbench/shared';

export const VECTOR_FILE_SCHEMA_ID = 'sinkbench.vectorfile.v1';

/** One vector as written on disk (snake_case keys). */
export interface RawVector {
  id: string;
  description: string;
  payload_html: string;
  payload_context?: string | string[];
  expected_tags?: string[] | null;
}

export interface VectorFileOptions {
  /** `ignore` nulls every expectation in the file. */
  expected_tags?: 'check' | 'ignore';
}

export interface VectorFileDocument {
  schema: typeof VECTOR_FILE_SCHEMA_ID;
  meta: Record<string, unknown>;
  options?: VectorFileOptions;
  vectors: RawVector[];
}

const contextSchema = { type: 'string', enum: [...PAYLOAD_CONTEXTS] } as const;

export const rawVectorSchema = {
  type: 'object',
  required: ['id', 'description', 'payload_html'],
  properties: {
    id: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    payload_html: { type: 'string' },
    payload_context: {
      anyOf: [contextSchema, { type: 'array', minItems: 1, items: contextSchema }],
    },
    expected_tags: {
      anyOf: [{ type: 'array', items: { type: 'string', minLength: 1 } }, { type: 'null' }],
    },
  },
  additionalProperties: true,
} as const;

export const legacyVectorListSchema = {
  type: 'array',
  items: rawVectorSchema,
} as const;

export const vectorFileSchema = {
  type: 'object',
  required: ['schema', 'meta', 'vectors'],
  properties: {
    schema: { const: VECTOR_FILE_SCHEMA_ID },
    meta: { type: 'object' },
    options: {
      type: 'object',
      properties: {
        expected_tags: { enum: ['check', 'ignore'] },
      },
      additionalProperties: false,
    },
    vectors: legacyVectorListSchema,
  },
  additionalProperties: false,
} as const;
