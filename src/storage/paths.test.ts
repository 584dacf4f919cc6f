/**
 * Path Resolution Utilities Tests
 *
 * @module storage/paths.test
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  getDataDir,
  resolveArtifactDirs,
  artifactDirKind,
  tableArtifactName,
  sidecarName,
  reportArtifactName,
  manifestName,
} from './paths.js';

describe('storage/paths', () => {
  // Store original env var to restore after tests
  const originalEnvVar = process.env.PIPELINE_DATA_DIR;

  afterEach(() => {
    if (originalEnvVar === undefined) {
      delete process.env.PIPELINE_DATA_DIR;
    } else {
      process.env.PIPELINE_DATA_DIR = originalEnvVar;
    }
  });

  describe('getDataDir', () => {
    it('should default to ./data when env var is not set', () => {
      delete process.env.PIPELINE_DATA_DIR;

      expect(getDataDir()).toBe(path.resolve('data'));
    });

    it('should use PIPELINE_DATA_DIR env var when set', () => {
      process.env.PIPELINE_DATA_DIR = '/custom/data/dir';

      expect(getDataDir()).toBe('/custom/data/dir');
    });

    it('should expand tilde in env var path', () => {
      process.env.PIPELINE_DATA_DIR = '~/housing';

      expect(getDataDir()).toBe(path.join(os.homedir(), 'housing'));
    });

    it('should handle empty env var as not set', () => {
      process.env.PIPELINE_DATA_DIR = '';

      expect(getDataDir()).toBe(path.resolve('data'));
    });
  });

  describe('resolveArtifactDirs', () => {
    it('should place every directory under the data dir by default', () => {
      expect(resolveArtifactDirs({}, '/srv/pipeline')).toEqual({
        raw: '/srv/pipeline/raw',
        processed: '/srv/pipeline/processed',
        results: '/srv/pipeline/results',
      });
    });

    it('should apply per-directory overrides', () => {
      expect(resolveArtifactDirs({ results: '/tmp/reports' }, '/srv/pipeline')).toEqual({
        raw: '/srv/pipeline/raw',
        processed: '/srv/pipeline/processed',
        results: '/tmp/reports',
      });
    });

    it('should fall back to the environment data dir', () => {
      process.env.PIPELINE_DATA_DIR = '/env/data';

      expect(resolveArtifactDirs().raw).toBe('/env/data/raw');
    });
  });

  describe('artifactDirKind', () => {
    it('should map stages to their directories', () => {
      expect(artifactDirKind('extract')).toBe('raw');
      expect(artifactDirKind('clean')).toBe('processed');
      expect(artifactDirKind('features')).toBe('processed');
      expect(artifactDirKind('report')).toBe('results');
    });
  });

  describe('artifact names', () => {
    it('should qualify table artifacts by year', () => {
      expect(tableArtifactName('extract', 2024)).toBe('raw_data_2024.csv');
      expect(tableArtifactName('clean', 2024)).toBe('clean_data_2024.csv');
      expect(tableArtifactName('features', 2023)).toBe('features_2023.csv');
    });

    it('should name sidecars after their artifact', () => {
      expect(sidecarName('raw_data_2024.csv')).toBe('raw_data_2024.csv.meta.json');
    });

    it('should name reports by format', () => {
      expect(reportArtifactName(2024, 'txt')).toBe('report_2024.txt');
      expect(reportArtifactName(2024, 'json')).toBe('report_2024.json');
    });

    it('should name the run manifest', () => {
      expect(manifestName(2024)).toBe('run_2024.json');
    });

    it('should reject years that are not positive integers', () => {
      expect(() => tableArtifactName('extract', 0)).toThrow('year must be a positive integer');
      expect(() => reportArtifactName(2024.5, 'txt')).toThrow('year must be a positive integer');
    });
  });
});
