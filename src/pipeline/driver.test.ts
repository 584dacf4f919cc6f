/**
 * Tests for the Pipeline Driver
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_PIPELINE_CONFIG } from '../config/defaults.js';
import { InvalidConfigError } from '../errors/index.js';
import { createRunParams } from '../schemas/run-params.js';
import { FileArtifactStore, MemoryArtifactStore, type ArtifactStore } from '../storage/artifact-store.js';
import { sha256 } from '../storage/atomic.js';
import { resolveArtifactDirs } from '../storage/paths.js';
import { createStages, TableSource } from '../stages/index.js';
import { RecordTable } from '../table/record-table.js';
import { createPipelineDriver, PipelineDriver, planStages } from './driver.js';
import { loadManifest } from './manifest.js';
import type { Stage, StageContext } from './types.js';

// ============================================================================
// Fixtures
// ============================================================================

const NOW = new Date('2024-06-15T10:30:00Z');

function housingRows(year: number, count: number): Record<string, number>[] {
  return Array.from({ length: count }, (_, i) => ({
    MedInc: 2 + i * 0.5,
    HouseAge: 10 + i,
    AveRooms: 5 + i * 0.1,
    AveBedrms: 1 + i * 0.01,
    Population: 500 + i * 10,
    AveOccup: 2.5,
    Latitude: 37.5,
    Longitude: -122.25,
    MedHouseVal: 1 + i * 0.2,
    year,
  }));
}

function source(): TableSource {
  return new TableSource(RecordTable.infer([...housingRows(2023, 3), ...housingRows(2024, 10)]), 'fixture');
}

function context(store: ArtifactStore, year = 2024): StageContext {
  return {
    params: createRunParams({ year }),
    config: DEFAULT_PIPELINE_CONFIG,
    store,
    now: () => NOW,
  };
}

// ============================================================================
// Registration
// ============================================================================

describe('PipelineDriver registration', () => {
  it('keeps stages in execution order', () => {
    const [extract, clean, features, report] = createStages(source());
    const driver = new PipelineDriver();
    driver.registerStages([report, clean, extract]);

    expect(driver.getAllStages().map((stage) => stage.name)).toEqual(['extract', 'clean', 'report']);
    expect(driver.getMissingStages()).toEqual(['features']);
    expect(driver.isComplete()).toBe(false);

    driver.registerStage(features);
    expect(driver.isComplete()).toBe(true);
  });

  it('rejects a second stage of the same name', () => {
    const driver = createPipelineDriver(createStages(source()));
    const [extract] = createStages(source());

    expect(() => driver.registerStage(extract)).toThrow('Stage "extract" is already registered');
  });

  it('refuses to run a selected stage that is not registered', async () => {
    const [extract] = createStages(source());
    const driver = createPipelineDriver([extract]);

    await expect(driver.execute(context(new MemoryArtifactStore()))).rejects.toThrow(
      'Stage "clean" not registered'
    );
  });
});

// ============================================================================
// planStages
// ============================================================================

describe('planStages', () => {
  it('runs every stage by default', () => {
    expect(planStages()).toEqual({ toExecute: ['extract', 'clean', 'features', 'report'], toSkip: [] });
  });

  it('honours fromStage and stopAfterStage', () => {
    expect(planStages({ fromStage: 'clean', stopAfterStage: 'features' })).toEqual({
      toExecute: ['clean', 'features'],
      toSkip: ['extract', 'report'],
    });
    expect(planStages({ fromStage: 'report' })).toEqual({
      toExecute: ['report'],
      toSkip: ['extract', 'clean', 'features'],
    });
  });

  it('rejects a start after the stop', () => {
    expect(() => planStages({ fromStage: 'report', stopAfterStage: 'clean' })).toThrow(InvalidConfigError);
  });
});

// ============================================================================
// Execution
// ============================================================================

describe('PipelineDriver.execute', () => {
  it('runs all four stages to done', async () => {
    const store = new MemoryArtifactStore();
    const driver = createPipelineDriver(createStages(source()));

    const result = await driver.execute(context(store));

    expect(result.state).toBe('done');
    expect(driver.state).toBe('done');
    expect(result.failure).toBeUndefined();
    expect(result.stagesExecuted).toEqual(['extract', 'clean', 'features', 'report']);
    expect(result.stagesSkipped).toEqual([]);
    expect(result.artifacts.map((ref) => ref.name)).toEqual([
      'raw_data_2024.csv',
      'clean_data_2024.csv',
      'features_2024.csv',
      'report_2024.txt',
    ]);
    expect(result.results.clean?.data).toMatchObject({ rowsIn: 10, rowsOut: 10 });
    expect(Object.keys(result.timing.perStage)).toEqual(['extract', 'clean', 'features', 'report']);
    expect(result.timing.startedAt).toBe('2024-06-15T10:30:00.000Z');
    expect(result.manifestLocation).toBe('memory://results/run_2024.json');
  });

  it('records the run in the manifest', async () => {
    const store = new MemoryArtifactStore();
    const result = await createPipelineDriver(createStages(source())).execute(context(store));

    const manifest = store.getManifest(2024);
    expect(manifest?.state).toBe('done');
    expect(manifest?.store).toBe('memory');
    expect(manifest?.stagesExecuted).toEqual(['extract', 'clean', 'features', 'report']);
    expect(manifest?.failedStage).toBeUndefined();
    expect(manifest?.artifacts.map((entry) => entry.sha256)).toEqual(result.artifacts.map((ref) => ref.sha256));
    expect(manifest?.artifacts[1].rowCount).toBe(10);
  });

  it('fails at extract for a year with no rows and writes no downstream artifacts', async () => {
    const store = new MemoryArtifactStore();
    const onStageStart = jest.fn();
    const onStageError = jest.fn();
    const driver = createPipelineDriver(createStages(source()), { onStageStart, onStageError });

    const result = await driver.execute(context(store, 1999));

    expect(result.state).toBe('failed');
    expect(driver.state).toBe('failed');
    expect(result.failure?.stage).toBe('extract');
    expect(result.failure?.code).toBe('EmptyResult');
    expect(result.failure?.message).toBe('No rows for year 1999 in fixture');
    expect(result.stagesExecuted).toEqual(['extract']);
    expect(result.artifacts).toEqual([]);
    expect(store.listArtifacts()).toEqual([]);
    expect(onStageStart).toHaveBeenCalledTimes(1);
    expect(onStageStart).toHaveBeenCalledWith('extract', 1);
    expect(onStageError).toHaveBeenCalledTimes(1);

    const manifest = store.getManifest(1999);
    expect(manifest?.state).toBe('failed');
    expect(manifest?.failedStage).toBe('extract');
    expect(manifest?.error).toBe('EmptyResult: No rows for year 1999 in fixture');
  });

  it('stops after the requested stage', async () => {
    const store = new MemoryArtifactStore();
    const onStageSkip = jest.fn();
    const driver = createPipelineDriver(createStages(source()), { onStageSkip });

    const result = await driver.execute(context(store), { stopAfterStage: 'clean' });

    expect(result.state).toBe('done');
    expect(result.stagesExecuted).toEqual(['extract', 'clean']);
    expect(result.stagesSkipped).toEqual(['features', 'report']);
    expect(store.listArtifacts()).toEqual(['clean_data_2024.csv', 'raw_data_2024.csv']);
    expect(onStageSkip.mock.calls).toEqual([['features'], ['report']]);
  });

  it('re-runs a single stage from the stored upstream artifact', async () => {
    const store = new MemoryArtifactStore();
    const driver = createPipelineDriver(createStages(source()));
    await driver.execute(context(store), { stopAfterStage: 'features' });

    const result = await driver.execute(context(store), { fromStage: 'report' });

    expect(result.state).toBe('done');
    expect(result.stagesExecuted).toEqual(['report']);
    expect(store.getReport(2024, 'txt')).toBeDefined();
  });

  it('fails with ArtifactMissing when starting from a stage without its input', async () => {
    const store = new MemoryArtifactStore();
    const driver = createPipelineDriver(createStages(source()));

    const result = await driver.execute(context(store), { fromStage: 'clean' });

    expect(result.state).toBe('failed');
    expect(result.failure?.stage).toBe('clean');
    expect(result.failure?.code).toBe('ArtifactMissing');
    expect(result.stagesSkipped).toEqual(['extract']);
    expect(store.listArtifacts()).toEqual([]);
  });

  it('reports unexpected errors without a code', async () => {
    const broken: Stage = {
      name: 'clean',
      number: 2,
      execute: () => Promise.reject(new Error('disk on fire')),
    };
    const [extract, , features, report] = createStages(source());
    const driver = createPipelineDriver([extract, broken, features, report]);

    const result = await driver.execute(context(new MemoryArtifactStore()));

    expect(result.state).toBe('failed');
    expect(result.failure).toMatchObject({ stage: 'clean', message: 'disk on fire' });
    expect(result.failure?.code).toBeUndefined();
    expect(result.stagesExecuted).toEqual(['extract', 'clean']);
    expect(result.artifacts.map((ref) => ref.name)).toEqual(['raw_data_2024.csv']);
  });
});

// ============================================================================
// File store
// ============================================================================

describe('PipelineDriver with a file store', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'driver-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('writes every artifact and a verifiable manifest', async () => {
    const dirs = resolveArtifactDirs({}, tempDir);
    const store = new FileArtifactStore(dirs);

    const result = await createPipelineDriver(createStages(source())).execute(context(store));

    expect(result.state).toBe('done');
    expect(result.manifestLocation).toBe(path.join(dirs.results, 'run_2024.json'));

    const manifest = await loadManifest(path.join(dirs.results, 'run_2024.json'));
    expect(manifest.artifacts.map((entry) => entry.name)).toEqual([
      'raw_data_2024.csv',
      'clean_data_2024.csv',
      'features_2024.csv',
      'report_2024.txt',
    ]);
    for (const entry of manifest.artifacts) {
      const content = await fs.readFile(entry.location);
      expect(entry.sha256).toBe(sha256(content));
      expect(entry.sizeBytes).toBe(content.length);
    }

    const report = await fs.readFile(path.join(dirs.results, 'report_2024.txt'), 'utf-8');
    expect(report.split('\n')[0]).toBe('# Yearly data report 2024');
  });
});
