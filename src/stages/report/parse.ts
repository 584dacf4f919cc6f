/**
 * Report Parsers
 *
 * Decode a rendered report back into its aggregate. Text and JSON renderings
 * of the same aggregate decode to equal values.
 *
 * @module stages/report/parse
 */

import { InvalidSchemaError } from '../../errors/index.js';
import { isPlainObject } from './render.js';
import { ReportAggregateSchema, type ReportAggregate } from './types.js';

// ============================================================================
// Entry Points
// ============================================================================

/**
 * @throws InvalidSchemaError on malformed lines or an invalid aggregate
 */
export function parseTextReport(text: string): ReportAggregate {
  const root: Record<string, unknown> = {};
  let section: Record<string, unknown> | undefined;

  text.split(/\r?\n/).forEach((line, index) => {
    const lineNumber = index + 1;
    if (line.trim() === '' || line.startsWith('#')) {
      return;
    }

    const header = /^\[([^\]]+)\]$/.exec(line);
    if (header) {
      section = {};
      setPath(root, [header[1]], section, lineNumber);
      return;
    }

    if (!section) {
      throw new InvalidSchemaError(`Report line ${lineNumber} appears before any section`);
    }
    const { path, value } = parseEntry(line, lineNumber);
    setPath(section, path, value, lineNumber);
  });

  return validateAggregate(root);
}

/**
 * @throws InvalidSchemaError on invalid JSON or an invalid aggregate
 */
export function parseJsonReport(text: string): ReportAggregate {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InvalidSchemaError(`Report is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return validateAggregate(parsed);
}

// ============================================================================
// Helpers
// ============================================================================

function validateAggregate(value: unknown): ReportAggregate {
  const result = ReportAggregateSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidSchemaError(`Invalid report: ${issues}`);
  }
  return result.data;
}

/**
 * Split `a."b c".d: <json>` into its path segments and decoded value.
 */
function parseEntry(line: string, lineNumber: number): { path: string[]; value: unknown } {
  const path: string[] = [];
  let i = 0;

  for (;;) {
    if (line[i] === '"') {
      let end = i + 1;
      while (end < line.length && line[end] !== '"') {
        end += line[end] === '\\' ? 2 : 1;
      }
      if (end >= line.length) {
        throw new InvalidSchemaError(`Report line ${lineNumber} has an unterminated key`);
      }
      path.push(decodeKey(line.slice(i, end + 1), lineNumber));
      i = end + 1;
    } else {
      const bare = /^[A-Za-z0-9_-]+/.exec(line.slice(i));
      if (!bare) {
        throw new InvalidSchemaError(`Report line ${lineNumber} has an invalid key`);
      }
      path.push(bare[0]);
      i += bare[0].length;
    }

    if (line[i] === '.') {
      i++;
    } else if (line.startsWith(': ', i)) {
      break;
    } else {
      throw new InvalidSchemaError(`Report line ${lineNumber} is not a "path: value" entry`);
    }
  }

  return { path, value: decodeJson(line.slice(i + 2), lineNumber) };
}

function decodeJson(text: string, lineNumber: number): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    throw new InvalidSchemaError(`Report line ${lineNumber} has an invalid value: ${text}`);
  }
}

function decodeKey(text: string, lineNumber: number): string {
  const key = decodeJson(text, lineNumber);
  if (typeof key !== 'string') {
    throw new InvalidSchemaError(`Report line ${lineNumber} has an invalid key`);
  }
  return key;
}

/**
 * Assign a value at a nested path, creating intermediate objects.
 */
function setPath(target: Record<string, unknown>, path: readonly string[], value: unknown, lineNumber: number): void {
  let current = target;
  path.forEach((segment, index) => {
    const isLeaf = index === path.length - 1;
    const existing = Object.hasOwn(current, segment) ? current[segment] : undefined;

    if (isLeaf) {
      if (existing !== undefined) {
        throw new InvalidSchemaError(`Report line ${lineNumber} repeats "${path.join('.')}"`);
      }
      defineEntry(current, segment, value);
      return;
    }

    if (existing === undefined) {
      const child: Record<string, unknown> = {};
      defineEntry(current, segment, child);
      current = child;
    } else if (isPlainObject(existing)) {
      current = existing;
    } else {
      throw new InvalidSchemaError(`Report line ${lineNumber} nests under a value at "${segment}"`);
    }
  });
}

// Labels such as "__proto__" must become own properties
function defineEntry(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
