import { describe, expect, it } from 'vitest';

import { sampleSummary } from '../test-utils/fixtures.js';
import { renderJsonReport, sortKeys } from './json.js';

describe('sortKeys', () => {
  it('sorts nested object keys and keeps array order', () => {
    const sorted = sortKeys({ b: 1, a: [{ z: 1, y: 2 }, 3], c: null });
    expect(JSON.stringify(sorted)).toBe('{"a":[{"y":2,"z":1},3],"b":1,"c":null}');
  });
});

describe('renderJsonReport', () => {
  it('round-trips the summary with sorted keys and a trailing newline', () => {
    const summary = sampleSummary();
    const json = renderJsonReport(summary);

    expect(json.endsWith('}\n')).toBe(true);
    expect(JSON.parse(json)).toEqual(summary);
    expect(json.split('\n').slice(0, 2)).toEqual(['{', '  "results": [']);
  });

  it('orders each result by key', () => {
    const [first] = JSON.parse(renderJsonReport(sampleSummary())).results;
    expect(Object.keys(first)).toEqual([
      'browser',
      'details',
      'executed',
      'lossy',
      'lossyDetails',
      'outcome',
      'payloadContext',
      'renderedHtml',
      'runPayloadContext',
      'sanitizedHtml',
      'sanitizer',
      'sanitizerInputHtml',
      'vectorId',
    ]);
  });
});
