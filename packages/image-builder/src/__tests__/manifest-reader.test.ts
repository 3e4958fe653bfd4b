import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { ManifestNotFoundError, ManifestParseError } from '@strata/core';
import { fixtures, silentLogger } from '@strata/test-utils';
import { ManifestReader, normalizePackageName, parseManifest } from '../manifest-reader';

describe('parseManifest', () => {
  it('should read names and specifier sets, ignoring comments and blank lines', () => {
    expect(parseManifest(fixtures.manifests.databaseApp)).toEqual([
      { name: 'django', constraint: '>=3.2,<3.3' },
      { name: 'djangorestframework', constraint: '==3.12.4' },
      { name: 'psycopg2', constraint: '>=2.8.6,<2.9' },
    ]);
  });

  it('should use * for unconstrained requirements', () => {
    expect(parseManifest('gunicorn\n')).toEqual([{ name: 'gunicorn', constraint: '*' }]);
  });

  it('should drop extras and environment markers', () => {
    expect(parseManifest('requests[security] >= 2.25 ; python_version >= "3.6"\n')).toEqual([
      { name: 'requests', constraint: '>=2.25' },
    ]);
  });

  it('should tolerate whitespace inside specifier sets', () => {
    expect(parseManifest('Django >= 3.2, < 3.3\r\n')).toEqual([
      { name: 'django', constraint: '>=3.2,<3.3' },
    ]);
  });

  it('should reject pip option lines', () => {
    expect(() => parseManifest('-r base.txt\n')).toThrow(
      "requirements.txt:1: pip options are not supported ('-r base.txt')"
    );
  });

  it('should reject duplicate requirements after name normalization', () => {
    const parse = () => parseManifest('Flask==2.0\nflask==2.1\n', 'app/requirements.txt');

    expect(parse).toThrow(ManifestParseError);
    expect(parse).toThrow("app/requirements.txt:2: duplicate requirement 'flask' ('flask==2.1')");
  });

  it('should reject invalid version specifiers', () => {
    expect(() => parseManifest('\nflask=>2.0\n')).toThrow(
      "requirements.txt:2: invalid version specifier '=>2.0' ('flask=>2.0')"
    );
  });

  it('should reject direct URL references', () => {
    expect(() => parseManifest('git+https://example.com/app.git\n')).toThrow(ManifestParseError);
  });

  it('should report the failing line on the error', () => {
    try {
      parseManifest('flask\n\n$$$\n');
      expect.unreachable('expected a parse error');
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestParseError);
      if (error instanceof ManifestParseError) {
        expect(error.line).toBe(3);
        expect(error.content).toBe('$$$');
        expect(error.code).toBe('MANIFEST_PARSE_ERROR');
      }
    }
  });
});

describe('normalizePackageName', () => {
  it('should lowercase and collapse separators', () => {
    expect(normalizePackageName('Django_REST.framework')).toBe('django-rest-framework');
    expect(normalizePackageName('zope..interface')).toBe('zope-interface');
  });
});

describe('ManifestReader', () => {
  const reader = new ManifestReader({ logger: silentLogger });
  let directory: string | undefined;

  afterEach(async () => {
    if (directory) {
      await fs.rm(directory, { recursive: true, force: true });
      directory = undefined;
    }
  });

  it('should read a manifest from disk', async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'strata-manifest-'));
    const manifestPath = path.join(directory, 'requirements.txt');
    await fs.writeFile(manifestPath, fixtures.manifests.flask);

    await expect(reader.read(manifestPath)).resolves.toEqual([{ name: 'flask', constraint: '==2.0' }]);
  });

  it('should raise ManifestNotFoundError for a missing file', async () => {
    const manifestPath = path.join(os.tmpdir(), 'strata-missing', 'requirements.txt');

    await expect(reader.read(manifestPath)).rejects.toThrow(ManifestNotFoundError);
    await expect(reader.read(manifestPath)).rejects.toThrow(
      `Dependency manifest not found: ${manifestPath}`
    );
  });

  it('should raise ManifestNotFoundError when the path is a directory', async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'strata-manifest-'));

    await expect(reader.read(directory)).rejects.toThrow(ManifestNotFoundError);
  });
});
