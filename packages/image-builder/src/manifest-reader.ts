import * as fs from 'fs/promises';
import pino, { type Logger } from 'pino';
import {
  IManifestReader,
  ManifestEntry,
  ManifestNotFoundError,
  ManifestParseError,
} from '@strata/core';

const REQUIREMENT_PATTERN =
  /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(?:\[[^\]]*\])?\s*([^;]*?)\s*(?:;.*)?$/;
const SPECIFIER_PATTERN = /^(===|~=|==|!=|<=|>=|<|>)\s*([A-Za-z0-9.*+!_-]+)$/;

/**
 * Reads a pip requirements file into `(name, constraint)` entries.
 *
 * Extras and environment markers are accepted and dropped; pip option lines,
 * direct URL references and duplicate names are rejected.
 */
export class ManifestReader implements IManifestReader {
  private logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? pino({ name: 'manifest-reader' });
  }

  async read(manifestPath: string): Promise<ManifestEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(manifestPath, 'utf-8');
    } catch (error) {
      if (isMissingPathError(error)) {
        throw new ManifestNotFoundError(manifestPath, { cause: error });
      }
      throw error;
    }

    const entries = parseManifest(content, manifestPath);
    this.logger.debug({ manifestPath, entries: entries.length }, 'Read dependency manifest');
    return entries;
  }
}

export function parseManifest(content: string, manifestPath = 'requirements.txt'): ManifestEntry[] {
  const entries: ManifestEntry[] = [];
  const seen = new Set<string>();

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.replace(/(^|\s)#.*$/, '').trim();
    if (line.length === 0) {
      return;
    }

    if (line.startsWith('-')) {
      throw new ManifestParseError(manifestPath, lineNumber, line, 'pip options are not supported');
    }

    const match = REQUIREMENT_PATTERN.exec(line);
    if (!match) {
      throw new ManifestParseError(manifestPath, lineNumber, line, 'malformed requirement');
    }

    const name = normalizePackageName(match[1]);
    const constraint = parseSpecifiers(match[2], manifestPath, lineNumber, line);

    if (seen.has(name)) {
      throw new ManifestParseError(manifestPath, lineNumber, line, `duplicate requirement '${name}'`);
    }
    seen.add(name);
    entries.push({ name, constraint });
  });

  return entries;
}

export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

function parseSpecifiers(
  raw: string,
  manifestPath: string,
  lineNumber: number,
  line: string
): string {
  if (raw.length === 0) {
    return '*';
  }

  return raw
    .split(',')
    .map((part) => {
      const match = SPECIFIER_PATTERN.exec(part.trim());
      if (!match) {
        throw new ManifestParseError(
          manifestPath,
          lineNumber,
          line,
          `invalid version specifier '${part.trim()}'`
        );
      }
      return `${match[1]}${match[2]}`;
    })
    .join(',');
}

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'EISDIR' || error.code === 'ENOTDIR';
}
