import { afterEach, describe, expect, it } from 'vitest';
import { createTempBuildContext, fixtures, silentLogger } from '@strata/test-utils';
import type { Image } from '@strata/core';
import { renderDockerfile } from '../dockerfile';
import { BuildOrchestrator } from '../orchestrator';

const emptyChanges = {
  packagesAdded: [],
  packagesRemoved: [],
  dependenciesInstalled: [],
  pathsWritten: [],
  usersCreated: [],
  ownershipChanges: [],
};

function image(overrides: Partial<Image> = {}): Image {
  return {
    id: `sha256:${'0'.repeat(64)}`,
    profile: 'minimal',
    baseImage: 'python:3.9.5-alpine',
    layers: [
      {
        index: 0,
        stage: 'CopySource',
        digest: `sha256:${'1'.repeat(64)}`,
        instructions: ['COPY ./src /app'],
        changes: emptyChanges,
      },
    ],
    packageGroups: [],
    installedPackages: [],
    dependencies: [],
    writablePaths: [],
    workingDirectory: '/app',
    activeUser: { username: 'user', uid: 1000, isPrivileged: false },
    environment: {},
    labels: {},
    ...overrides,
  };
}

describe('renderDockerfile', () => {
  let cleanup: (() => Promise<void>) | undefined;

  afterEach(async () => {
    await cleanup?.();
    cleanup = undefined;
  });

  it('should render base image, layers, working directory and user', () => {
    expect(renderDockerfile(image())).toBe(
      ['FROM python:3.9.5-alpine', '', '# CopySource', 'COPY ./src /app', '', 'WORKDIR /app', 'USER user', ''].join(
        '\n'
      )
    );
  });

  it('should quote labels and environment values that need it', () => {
    const rendered = renderDockerfile(
      image({
        labels: { maintainer: 'Web Team' },
        environment: { PYTHONPATH: '/app', GREETING: 'hello world' },
      })
    );

    expect(rendered.split('\n').slice(0, 5)).toEqual([
      'FROM python:3.9.5-alpine',
      'LABEL maintainer="Web Team"',
      '',
      'ENV PYTHONPATH=/app',
      'ENV GREETING="hello world"',
    ]);
  });

  it('should render a built image in stage order', async () => {
    const temp = await createTempBuildContext({ requirements: fixtures.manifests.flask });
    cleanup = temp.cleanup;
    const built = await new BuildOrchestrator({ logger: silentLogger }).build(temp.context, 'minimal');

    expect(renderDockerfile(built)).toBe(
      [
        'FROM python:3.9.5-alpine',
        'LABEL maintainer="Strata"',
        '',
        'ENV PYTHONUNBUFFERED=1',
        'ENV PYTHONPATH=/app',
        '',
        '# InstallDependencies',
        'COPY ./requirements.txt /requirements.txt',
        'RUN pip install -r /requirements.txt',
        '',
        '# CopySource',
        'COPY ./src /app',
        '',
        '# ReducePrivileges',
        'RUN adduser -D user',
        '',
        'WORKDIR /app',
        'USER user',
        '',
      ].join('\n')
    );
  });
});
