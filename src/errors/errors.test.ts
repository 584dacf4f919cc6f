/**
 * Tests for pipeline errors
 */

import { describe, it, expect } from '@jest/globals';
import {
  ArtifactMissingError,
  EmptyResultError,
  InvalidConfigError,
  InvalidSchemaError,
  PipelineError,
  SourceUnavailableError,
  UnknownColumnError,
  UnsupportedFormatError,
  describeError,
  isPipelineError,
  stringifyError,
} from './index.js';

describe('PipelineError subclasses', () => {
  it('carry a stable code and name', () => {
    const cases: Array<[PipelineError, string, string]> = [
      [new SourceUnavailableError('housing.csv', 'ENOENT'), 'SourceUnavailable', 'SourceUnavailableError'],
      [new EmptyResultError(1999, 'housing.csv'), 'EmptyResult', 'EmptyResultError'],
      [new InvalidSchemaError('bad row'), 'InvalidSchema', 'InvalidSchemaError'],
      [new UnknownColumnError('price', 'bucket "band"'), 'UnknownColumn', 'UnknownColumnError'],
      [new UnsupportedFormatError('xml', ['txt', 'json']), 'UnsupportedFormat', 'UnsupportedFormatError'],
      [new ArtifactMissingError('raw_data_2024.csv', '/data/raw'), 'ArtifactMissing', 'ArtifactMissingError'],
      [new InvalidConfigError('bad config'), 'InvalidConfig', 'InvalidConfigError'],
    ];

    for (const [error, code, name] of cases) {
      expect(error).toBeInstanceOf(PipelineError);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
    }
  });

  it('format their messages', () => {
    expect(new SourceUnavailableError('housing.csv', 'ENOENT').message).toBe(
      'Source unavailable: housing.csv (ENOENT)'
    );
    expect(new EmptyResultError(1999, 'housing.csv').message).toBe('No rows for year 1999 in housing.csv');
    expect(new UnknownColumnError('price', 'bucket "band"').message).toBe(
      'Unknown column "price" referenced by bucket "band"'
    );
    expect(new UnsupportedFormatError('xml', ['txt', 'json']).message).toBe(
      'Unsupported report format "xml" (expected one of: txt, json)'
    );
    expect(new ArtifactMissingError('raw_data_2024.csv', '/data/raw').message).toBe(
      'Artifact not found: raw_data_2024.csv (/data/raw)'
    );
  });

  it('keep the cause', () => {
    const cause = new Error('ENOENT');
    expect(new SourceUnavailableError('housing.csv', 'ENOENT', { cause }).cause).toBe(cause);
  });

  it('record the offending columns of a schema error', () => {
    expect(new InvalidSchemaError('bad', ['a', 'b']).columns).toEqual(['a', 'b']);
    expect(new InvalidSchemaError('bad').columns).toEqual([]);
  });
});

describe('error helpers', () => {
  it('isPipelineError narrows pipeline errors only', () => {
    expect(isPipelineError(new EmptyResultError(2024, 'x'))).toBe(true);
    expect(isPipelineError(new Error('plain'))).toBe(false);
    expect(isPipelineError('text')).toBe(false);
  });

  it('stringifyError handles non-errors', () => {
    expect(stringifyError(new Error('boom'))).toBe('boom');
    expect(stringifyError(42)).toBe('42');
  });

  it('describeError prefixes the code', () => {
    expect(describeError(new EmptyResultError(1999, 'housing.csv'))).toBe(
      'EmptyResult: No rows for year 1999 in housing.csv'
    );
    expect(describeError(new Error('disk on fire'))).toBe('disk on fire');
  });
});
