import { describe, test, expect } from 'vitest';

import { ConfigError } from '../../types/errors.js';
import { dompurifySanitizer } from '../dompurify.js';
import { noopSanitizer } from '../noop.js';
import { ALLOWED_URI_REGEXP, allowedAttributesForTag } from '../policy.js';
import { getSanitizer, listSanitizers, resolveSanitizers } from '../registry.js';
import { explicitlySupports, supportsContext, type Sanitizer } from '../types.js';

describe('policy', () => {
  test('per-tag attributes extend the global set', () => {
    expect([...allowedAttributesForTag('IMG')].sort()).toEqual([
      'alt',
      'class',
      'dir',
      'height',
      'id',
      'lang',
      'loading',
      'src',
      'style',
      'title',
      'width',
    ]);
    expect(allowedAttributesForTag('span').has('href')).toBe(false);
    expect(allowedAttributesForTag('td').has('colspan')).toBe(true);
    expect(allowedAttributesForTag('  ').size).toBe(0);
  });

  test('URI policy accepts listed schemes and relative URLs only', () => {
    expect(ALLOWED_URI_REGEXP.test('https://ok.test/')).toBe(true);
    expect(ALLOWED_URI_REGEXP.test('tel:123')).toBe(true);
    expect(ALLOWED_URI_REGEXP.test('/relative')).toBe(true);
    expect(ALLOWED_URI_REGEXP.test('javascript:alert(1)')).toBe(false);
    expect(ALLOWED_URI_REGEXP.test('data:text/html,x')).toBe(false);
  });
});

describe('noop sanitizer', () => {
  test('returns input unchanged', () => {
    expect(noopSanitizer.sanitize('<script>alert(1)</script>')).toBe(
      '<script>alert(1)</script>'
    );
  });

  test('supports markup, script and handler contexts but not href', () => {
    expect(supportsContext(noopSanitizer, 'js_string')).toBe(true);
    expect(supportsContext(noopSanitizer, 'onerror_attr')).toBe(true);
    expect(supportsContext(noopSanitizer, 'href')).toBe(false);
  });
});

describe('dompurify sanitizer', () => {
  test('keeps allowed formatting', () => {
    expect(dompurifySanitizer.sanitize('<p>Hello <b>world</b></p>')).toBe(
      '<p>Hello <b>world</b></p>'
    );
  });

  test('drops event handlers and script elements', () => {
    expect(dompurifySanitizer.sanitize('<img src="x" onerror="alert(1)">')).toBe(
      '<img src="x">'
    );
    expect(dompurifySanitizer.sanitize('<script>alert(1)</script>ok')).toBe('ok');
  });

  test('drops unsafe URLs and keeps safe ones', () => {
    expect(dompurifySanitizer.sanitize('<a href="javascript:alert(1)">x</a>')).toBe('<a>x</a>');
    expect(dompurifySanitizer.sanitize('<a href="https://ok.test/" onclick="f()">x</a>')).toBe(
      '<a href="https://ok.test/">x</a>'
    );
  });

  test('applies attribute rules per tag', () => {
    expect(dompurifySanitizer.sanitize('<span colspan="2" title="t">x</span>')).toBe(
      '<span title="t">x</span>'
    );
  });

  test('does not support script contexts', () => {
    expect(supportsContext(dompurifySanitizer, 'js')).toBe(false);
    expect(supportsContext(dompurifySanitizer, 'http_leak')).toBe(true);
  });
});

describe('registry', () => {
  test('lists every sanitizer', () => {
    expect(listSanitizers().map((sanitizer) => sanitizer.name)).toEqual(['noop', 'dompurify']);
  });

  test('resolves names and rejects unknown ones', () => {
    expect(resolveSanitizers(['dompurify', ' noop'])).toEqual([dompurifySanitizer, noopSanitizer]);
    expect(() => getSanitizer('bleach')).toThrow(ConfigError);
    expect(() => getSanitizer('bleach')).toThrow('Unknown sanitizer: bleach');
  });

  test('explicit support ignores universal sanitizers', () => {
    const universal: Sanitizer = {
      name: 'universal',
      description: 'test',
      sanitize: (html) => html,
      supportedContexts: null,
    };
    expect(supportsContext(universal, 'href')).toBe(true);
    expect(explicitlySupports(universal, 'href')).toBe(false);
    expect(explicitlySupports(noopSanitizer, 'onerror_attr')).toBe(true);
  });
});
