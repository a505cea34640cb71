/**
 * Result type tests
 */

import { describe, test, expect } from 'vitest';
import { Ok, Err } from '../src/models/result.js';
import { ConfigError } from '../src/models/errors.js';

describe('Result Type', () => {
  test('Ok creates success result', () => {
    const result = Ok(42);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toBe(42);
    }
  });

  test('Err creates error result', () => {
    const result = Err('error message');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe('error message');
    }
  });
});

describe('ConfigError', () => {
  test('lists every issue in its message', () => {
    const error = new ConfigError('/srv/runspec.yaml', [
      { path: 'tests[0].name', message: 'name is required' },
      { path: '', message: 'something about the file' },
    ]);
    expect(error.name).toBe('ConfigError');
    expect(error.issues).toHaveLength(2);
    expect(error.message).toBe(
      [
        'Invalid config /srv/runspec.yaml (2 problems):',
        '  - tests[0].name: name is required',
        '  - something about the file',
      ].join('\n')
    );
  });
});
