/**
 * Artifact Store
 *
 * Where stages persist their outputs and read their inputs. Table artifacts are
 * keyed by (stage, year); reports and run manifests by year. Stages only see
 * the {@link ArtifactStore} interface, so a run can target the filesystem or
 * stay in memory.
 *
 * @module storage/artifact-store
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ArtifactMissingError, InvalidSchemaError } from '../errors/index.js';
import type { RunManifest } from '../schemas/manifest.js';
import type { ReportFormat } from '../schemas/pipeline-config.js';
import {
  ArtifactSidecarSchema,
  createArtifactMeta,
  createArtifactSidecar,
  type ArtifactMeta,
  type StageName,
  type TableStageName,
} from '../schemas/stage.js';
import { parseCsv, serializeCsv } from '../table/csv.js';
import type { RecordTable } from '../table/record-table.js';
import { atomicWriteFile, atomicWriteFiles, atomicWriteJson, fileExists, isErrnoError, readJson, sha256 } from './atomic.js';
import {
  artifactDirKind,
  manifestName,
  reportArtifactName,
  sidecarName,
  tableArtifactName,
  type ArtifactDirs,
} from './paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Reference to a persisted artifact, as listed in the run manifest.
 */
export interface ArtifactRef {
  stage: StageName;
  year: number;
  /** File name, e.g. "features_2024.csv" */
  name: string;
  /** Absolute path, or memory://<dir>/<name> for the in-memory store */
  location: string;
  /** SHA-256 of the serialized bytes */
  sha256: string;
  sizeBytes: number;
  /** Data rows, for table artifacts */
  rowCount?: number;
}

/**
 * Persistence capability handed to every stage.
 */
export interface ArtifactStore {
  /**
   * Persist a stage's table for a year, replacing any previous one.
   *
   * @param upstream - Name of the artifact the table was derived from
   */
  writeTable(stage: TableStageName, year: number, table: RecordTable, upstream?: string): Promise<ArtifactRef>;

  /**
   * Load a stage's table for a year.
   *
   * @throws ArtifactMissingError if the stage has not written one
   */
  readTable(stage: TableStageName, year: number): Promise<RecordTable>;

  hasTable(stage: TableStageName, year: number): Promise<boolean>;

  writeReport(year: number, format: ReportFormat, bytes: Buffer): Promise<ArtifactRef>;

  /**
   * Persist the run manifest for a year.
   *
   * @returns the manifest's location
   */
  writeManifest(year: number, manifest: RunManifest): Promise<string>;

  /**
   * Human-readable description, recorded in the manifest.
   */
  describe(): string;
}

// ============================================================================
// File Store
// ============================================================================

/**
 * Filesystem store: CSV tables with a JSON sidecar holding the column types.
 *
 * Both files are staged as temp files before either replaces its target, so a
 * failed write keeps the previous CSV and sidecar together. The presence of the
 * CSV marks a complete artifact.
 */
export class FileArtifactStore implements ArtifactStore {
  constructor(private readonly dirs: ArtifactDirs) {}

  async writeTable(
    stage: TableStageName,
    year: number,
    table: RecordTable,
    upstream?: string
  ): Promise<ArtifactRef> {
    const name = tableArtifactName(stage, year);
    const location = this.pathFor(stage, name);
    const meta = createArtifactMeta({ stageName: stage, year, rowCount: table.rowCount, upstream });
    const csv = serializeCsv(table);

    await atomicWriteFiles([
      { path: location, content: csv },
      {
        path: this.sidecarPathFor(location, name),
        content: JSON.stringify(createArtifactSidecar(meta, table.columns), null, 2),
      },
    ]);

    return {
      stage,
      year,
      name,
      location,
      sha256: sha256(csv),
      sizeBytes: Buffer.byteLength(csv, 'utf-8'),
      rowCount: table.rowCount,
    };
  }

  async readTable(stage: TableStageName, year: number): Promise<RecordTable> {
    const name = tableArtifactName(stage, year);
    const location = this.pathFor(stage, name);

    let text: string;
    try {
      text = await fs.readFile(location, 'utf-8');
    } catch (error) {
      if (isErrnoError(error, 'ENOENT')) {
        throw new ArtifactMissingError(name, location);
      }
      throw error;
    }

    const sidecarPath = this.sidecarPathFor(location, name);
    if (!(await fileExists(sidecarPath))) {
      return parseCsv(text);
    }

    const sidecar = ArtifactSidecarSchema.safeParse(await readJson(sidecarPath));
    if (!sidecar.success) {
      throw new InvalidSchemaError(`Invalid artifact sidecar ${sidecarPath}: ${sidecar.error.message}`);
    }
    return parseCsv(text, sidecar.data.columns);
  }

  async hasTable(stage: TableStageName, year: number): Promise<boolean> {
    return fileExists(this.pathFor(stage, tableArtifactName(stage, year)));
  }

  async writeReport(year: number, format: ReportFormat, bytes: Buffer): Promise<ArtifactRef> {
    const name = reportArtifactName(year, format);
    const location = this.pathFor('report', name);
    await atomicWriteFile(location, bytes);
    return {
      stage: 'report',
      year,
      name,
      location,
      sha256: sha256(bytes),
      sizeBytes: bytes.length,
    };
  }

  async writeManifest(year: number, manifest: RunManifest): Promise<string> {
    const location = path.join(this.dirs.results, manifestName(year));
    await atomicWriteJson(location, manifest);
    return location;
  }

  describe(): string {
    return `file(raw=${this.dirs.raw}, processed=${this.dirs.processed}, results=${this.dirs.results})`;
  }

  private pathFor(stage: StageName, name: string): string {
    return path.join(this.dirs[artifactDirKind(stage)], name);
  }

  private sidecarPathFor(location: string, name: string): string {
    return path.join(path.dirname(location), sidecarName(name));
  }
}

// ============================================================================
// Memory Store
// ============================================================================

interface StoredTable {
  table: RecordTable;
  meta: ArtifactMeta;
}

/**
 * In-process store for tests and dry runs. Tables are kept as the immutable
 * RecordTable itself; checksums are taken over the CSV the file store would write.
 */
export class MemoryArtifactStore implements ArtifactStore {
  private readonly tables = new Map<string, StoredTable>();
  private readonly reports = new Map<string, Buffer>();
  private readonly manifests = new Map<number, RunManifest>();

  async writeTable(
    stage: TableStageName,
    year: number,
    table: RecordTable,
    upstream?: string
  ): Promise<ArtifactRef> {
    const name = tableArtifactName(stage, year);
    const csv = serializeCsv(table);
    const meta = createArtifactMeta({ stageName: stage, year, rowCount: table.rowCount, upstream });
    this.tables.set(name, { table, meta });
    return {
      stage,
      year,
      name,
      location: this.locationOf(stage, name),
      sha256: sha256(csv),
      sizeBytes: Buffer.byteLength(csv, 'utf-8'),
      rowCount: table.rowCount,
    };
  }

  async readTable(stage: TableStageName, year: number): Promise<RecordTable> {
    const name = tableArtifactName(stage, year);
    const stored = this.tables.get(name);
    if (!stored) {
      throw new ArtifactMissingError(name, this.locationOf(stage, name));
    }
    return stored.table;
  }

  async hasTable(stage: TableStageName, year: number): Promise<boolean> {
    return this.tables.has(tableArtifactName(stage, year));
  }

  async writeReport(year: number, format: ReportFormat, bytes: Buffer): Promise<ArtifactRef> {
    const name = reportArtifactName(year, format);
    this.reports.set(name, Buffer.from(bytes));
    return {
      stage: 'report',
      year,
      name,
      location: this.locationOf('report', name),
      sha256: sha256(bytes),
      sizeBytes: bytes.length,
    };
  }

  async writeManifest(year: number, manifest: RunManifest): Promise<string> {
    this.manifests.set(year, manifest);
    return this.locationOf('report', manifestName(year));
  }

  describe(): string {
    return 'memory';
  }

  /**
   * Names of every stored table and report, sorted.
   */
  listArtifacts(): string[] {
    return [...this.tables.keys(), ...this.reports.keys()].sort();
  }

  /**
   * Metadata recorded with a stored table.
   */
  getMeta(stage: TableStageName, year: number): ArtifactMeta | undefined {
    return this.tables.get(tableArtifactName(stage, year))?.meta;
  }

  getReport(year: number, format: ReportFormat): Buffer | undefined {
    return this.reports.get(reportArtifactName(year, format));
  }

  getManifest(year: number): RunManifest | undefined {
    return this.manifests.get(year);
  }

  private locationOf(stage: StageName, name: string): string {
    return `memory://${artifactDirKind(stage)}/${name}`;
  }
}
