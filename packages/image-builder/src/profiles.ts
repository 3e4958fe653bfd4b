import type { FeatureProfile, PackageGroupKind, PackageGroupName } from '@strata/core';

export interface GroupDefinition {
  kind: PackageGroupKind;
  members: string[];
  // Transient groups a permanent group's language bindings compile against.
  buildRequires: PackageGroupName[];
}

export interface ProfileDefinition {
  permanentGroups: PackageGroupName[];
  writablePaths: string[];
}

// Alpine (apk) package names.
export const GROUP_DEFINITIONS: Record<PackageGroupName, GroupDefinition> = {
  'database-client': {
    kind: 'permanent',
    members: ['postgresql-client'],
    buildRequires: ['compiler-toolchain', 'database-dev-headers'],
  },
  'image-runtime-libs': {
    kind: 'permanent',
    members: ['jpeg-dev'],
    buildRequires: ['compiler-toolchain', 'compression-dev-libs'],
  },
  'compiler-toolchain': {
    kind: 'transient',
    members: ['gcc', 'libc-dev', 'linux-headers', 'musl-dev'],
    buildRequires: [],
  },
  'database-dev-headers': {
    kind: 'transient',
    members: ['postgresql-dev'],
    buildRequires: [],
  },
  'compression-dev-libs': {
    kind: 'transient',
    members: ['zlib', 'zlib-dev'],
    buildRequires: [],
  },
};

export const PROFILES: Record<FeatureProfile, ProfileDefinition> = {
  full: {
    permanentGroups: ['database-client', 'image-runtime-libs'],
    writablePaths: ['/vol/web/media', '/vol/web/static'],
  },
  'database-only': {
    permanentGroups: ['database-client'],
    writablePaths: [],
  },
  minimal: {
    permanentGroups: [],
    writablePaths: [],
  },
};

/**
 * Python distributions that compile C extensions during `pip install`, keyed by
 * normalized name, with the OS packages that must be present while they build.
 */
export const NATIVE_BUILD_REQUIREMENTS: Record<string, string[]> = {
  psycopg2: ['gcc', 'musl-dev', 'postgresql-dev'],
  pillow: ['gcc', 'musl-dev', 'zlib-dev', 'jpeg-dev'],
  uwsgi: ['gcc', 'libc-dev', 'linux-headers'],
};
