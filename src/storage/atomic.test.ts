/**
 * Tests for atomic file operations
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { atomicWriteFile, atomicWriteJson, readJson, fileExists, sha256, isErrnoError } from './atomic.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWriteFile', () => {
    it('writes text content', async () => {
      const filePath = path.join(tempDir, 'table.csv');
      await atomicWriteFile(filePath, 'a,b\n1,2\n');

      expect(await fs.readFile(filePath, 'utf-8')).toBe('a,b\n1,2\n');
    });

    it('writes buffers', async () => {
      const filePath = path.join(tempDir, 'report.txt');
      await atomicWriteFile(filePath, Buffer.from('hello', 'utf-8'));

      expect(await fs.readFile(filePath, 'utf-8')).toBe('hello');
    });

    it('leaves no temp files behind', async () => {
      await atomicWriteFile(path.join(tempDir, 'out.csv'), 'x\n');

      expect(await fs.readdir(tempDir)).toEqual(['out.csv']);
    });

    it('names the target file when the write fails', async () => {
      const blocker = path.join(tempDir, 'blocker');
      await fs.writeFile(blocker, 'not a directory');

      await expect(atomicWriteFile(path.join(blocker, 'out.csv'), 'x')).rejects.toThrow(
        `Atomic write failed for ${path.join(blocker, 'out.csv')}`
      );
    });
  });

  describe('atomicWriteJson', () => {
    const sidecar = { _meta: { stageName: 'clean', year: 2024, rowCount: 3 }, columns: [] };

    it('writes pretty-printed JSON', async () => {
      const filePath = path.join(tempDir, 'clean_data_2024.csv.meta.json');
      await atomicWriteJson(filePath, { year: 2024 });

      expect(await fs.readFile(filePath, 'utf-8')).toBe('{\n  "year": 2024\n}');
    });

    it('creates the results directory on first write', async () => {
      const filePath = path.join(tempDir, 'results', 'run_2024.json');
      await atomicWriteJson(filePath, sidecar);

      expect(await readJson(filePath)).toEqual(sidecar);
    });

    it('replaces the previous document for the same year', async () => {
      const filePath = path.join(tempDir, 'run_2024.json');
      await atomicWriteJson(filePath, { state: 'failed' });
      await atomicWriteJson(filePath, { state: 'done' });

      expect(await readJson(filePath)).toEqual({ state: 'done' });
    });
  });

  describe('readJson', () => {
    it('names a missing file', async () => {
      const filePath = path.join(tempDir, 'run_1999.json');
      await expect(readJson(filePath)).rejects.toThrow(`File not found: ${filePath}`);
    });

    it('names a file that is not JSON', async () => {
      const filePath = path.join(tempDir, 'run_2024.json');
      await fs.writeFile(filePath, 'year=2024');

      await expect(readJson(filePath)).rejects.toThrow(`Invalid JSON in file: ${filePath}`);
    });
  });

  describe('fileExists', () => {
    it('is true only for regular files', async () => {
      const filePath = path.join(tempDir, 'raw_data_2024.csv');
      await fs.writeFile(filePath, 'a\n1\n');

      expect(await fileExists(filePath)).toBe(true);
      expect(await fileExists(path.join(tempDir, 'raw_data_1999.csv'))).toBe(false);
      expect(await fileExists(tempDir)).toBe(false);
    });

    it('is false below a path that is a file', async () => {
      const filePath = path.join(tempDir, 'raw_data_2024.csv');
      await fs.writeFile(filePath, 'a\n1\n');

      expect(await fileExists(path.join(filePath, 'nested.csv'))).toBe(false);
    });
  });

  describe('sha256', () => {
    it('hashes strings and buffers alike', () => {
      expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
      expect(sha256(Buffer.from('abc'))).toBe(sha256('abc'));
    });
  });

  describe('isErrnoError', () => {
    it('matches system errors by code', async () => {
      const error = await fs.readFile(path.join(tempDir, 'missing')).catch((e: unknown) => e);
      expect(isErrnoError(error, 'ENOENT')).toBe(true);
      expect(isErrnoError(error, 'EACCES')).toBe(false);
      expect(isErrnoError(new Error('plain'), 'ENOENT')).toBe(false);
    });
  });
});
