import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigError, RuntimeIdentity } from '@strata/core';
import { normalizePackageName } from './manifest-reader';
import { NATIVE_BUILD_REQUIREMENTS } from './profiles';

const Members = z.array(z.string().min(1)).min(1);

export const GroupMemberOverrides = z.object({
  'database-client': Members.optional(),
  'image-runtime-libs': Members.optional(),
  'compiler-toolchain': Members.optional(),
  'database-dev-headers': Members.optional(),
  'compression-dev-libs': Members.optional(),
});
export type GroupMemberOverrides = z.infer<typeof GroupMemberOverrides>;

export const StrataConfigSchema = z
  .object({
    baseImage: z.string().min(1).default('python:3.9.5-alpine'),
    labels: z.record(z.string()).default({ maintainer: 'Strata' }),
    runtimeUser: RuntimeIdentity.default({ username: 'user', isPrivileged: false }),
    workingDirectory: z.string().startsWith('/').default('/app'),
    manifestPath: z.string().min(1).default('requirements.txt'),
    sourceDirectory: z.string().min(1).default('src'),
    // Defaults to PYTHONUNBUFFERED=1 and PYTHONPATH=<workingDirectory>.
    environment: z.record(z.string()).optional(),
    writableMode: z.number().int().min(0).max(0o7777).default(0o755),
    groupMembers: GroupMemberOverrides.default({}),
    // Entries are merged over NATIVE_BUILD_REQUIREMENTS, keyed by normalized distribution name.
    nativeBuildRequirements: z
      .record(z.array(z.string().min(1)))
      .default({})
      .transform(mergeNativeBuildRequirements),
    virtualPackageName: z.string().regex(/^\.[a-z0-9._-]+$/).default('.temp-build-deps'),
  })
  .transform((config) => ({
    ...config,
    environment: config.environment ?? {
      PYTHONUNBUFFERED: '1',
      PYTHONPATH: config.workingDirectory,
    },
  }));

export type StrataConfig = z.infer<typeof StrataConfigSchema>;
export type StrataConfigInput = z.input<typeof StrataConfigSchema>;

export function mergeNativeBuildRequirements(
  overrides: Record<string, string[]>
): Record<string, string[]> {
  const merged: Record<string, string[]> = {};
  for (const [name, packages] of Object.entries(NATIVE_BUILD_REQUIREMENTS)) {
    merged[name] = [...packages];
  }
  for (const [name, packages] of Object.entries(overrides)) {
    merged[normalizePackageName(name)] = [...packages];
  }
  return merged;
}

export function parseConfig(input: unknown, source = 'configuration'): StrataConfig {
  const result = StrataConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${source}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Loads configuration from an optional JSON file, then applies
 * STRATA_BASE_IMAGE and STRATA_RUNTIME_USER from the environment.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<StrataConfig> {
  let fileConfig: Record<string, unknown> = {};

  if (configPath) {
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read configuration file ${configPath}`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Configuration file ${configPath} is not valid JSON`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`Configuration file ${configPath} must contain a JSON object`);
    }
    fileConfig = { ...parsed };
  }

  if (env.STRATA_BASE_IMAGE) {
    fileConfig.baseImage = env.STRATA_BASE_IMAGE;
  }
  if (env.STRATA_RUNTIME_USER) {
    fileConfig.runtimeUser = { username: env.STRATA_RUNTIME_USER, isPrivileged: false };
  }

  return parseConfig(fileConfig, configPath ?? 'configuration');
}
