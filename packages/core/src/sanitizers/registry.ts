import { suggestAlternatives } from '../errors/suggestions.js';
import { ConfigError } from '../types/errors.js';
import { dompurifySanitizer } from './dompurify.js';
import { noopSanitizer } from './noop.js';
import type { Sanitizer } from './types.js';

const REGISTRY: ReadonlyMap<string, Sanitizer> = new Map(
  [noopSanitizer, dompurifySanitizer].map((sanitizer) => [sanitizer.name, sanitizer])
);

export const DEFAULT_SANITIZERS = ['noop', 'dompurify'] as const;

export function listSanitizers(): Sanitizer[] {
  return [...REGISTRY.values()];
}

export function getSanitizer(name: string): Sanitizer {
  const sanitizer = REGISTRY.get(name.trim());
  if (!sanitizer) {
    throw new ConfigError({
      message: `Unknown sanitizer: ${name}`,
      context: {
        setting: 'sanitizers',
        suggestion: suggestAlternatives(name.trim(), [...REGISTRY.keys()]),
      },
    });
  }
  return sanitizer;
}

export function resolveSanitizers(names: readonly string[]): Sanitizer[] {
  return names.map(getSanitizer);
}
