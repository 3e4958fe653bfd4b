/**
 * Shared test helpers for Strata tests
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import pino from 'pino';
import { expect } from 'vitest';
import type { BuildContext, BuildPlan, Image } from '@strata/core';
import { fixtures } from './fixtures';

/**
 * Logger that drops everything, for components under test
 */
export const silentLogger = pino({ level: 'silent' });

export interface TempBuildContext {
  directory: string;
  context: BuildContext;
  cleanup(): Promise<void>;
}

/**
 * Creates a build context on disk: `requirements.txt` plus a `src` tree
 */
export async function createTempBuildContext(
  options: { requirements?: string; sourceFiles?: Record<string, string> } = {}
): Promise<TempBuildContext> {
  const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'strata-test-'));
  const manifestPath = path.join(directory, 'requirements.txt');
  const sourceDirectory = path.join(directory, 'src');

  await fs.writeFile(manifestPath, options.requirements ?? fixtures.manifests.flask);
  for (const [relativePath, content] of Object.entries(options.sourceFiles ?? fixtures.sources.wsgiApp)) {
    const filePath = path.join(sourceDirectory, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
  await fs.mkdir(sourceDirectory, { recursive: true });

  return {
    directory,
    context: {
      manifestPath,
      sourceDirectory,
      targetDirectory: '/app',
      contextDirectory: directory,
    },
    cleanup: () => fs.rm(directory, { recursive: true, force: true }),
  };
}

/**
 * Validates that an image runs as a non-privileged user that owns every writable path
 */
export function expectUnprivilegedImage(image: Image) {
  expect(image.activeUser.isPrivileged).toBe(false);
  expect(image.activeUser.username).not.toBe('root');
  for (const writable of image.writablePaths) {
    expect(writable.owner).toEqual(image.activeUser);
  }
}

/**
 * Validates that no member of a transient group survived into the image
 */
export function expectNoTransientPackages(image: Image, plan: BuildPlan) {
  const transientMembers = plan.transientGroups.flatMap((group) => group.members);
  for (const member of transientMembers) {
    expect(image.installedPackages).not.toContain(member);
  }
}

/**
 * Stages of an image's layers, in commit order
 */
export function layerStages(image: Image): string[] {
  return image.layers.map((layer) => layer.stage);
}
