import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StageFailedError } from '@strata/core';
import {
  TempBuildContext,
  createTempBuildContext,
  fixtures,
  silentLogger,
} from '@strata/test-utils';
import { SimulatedBuildRoot } from '../build-root';
import { LayerPlanner } from '../layer-planner';
import { parseManifest } from '../manifest-reader';
import { STAGE_ORDER, StageExecutor } from '../stage-executor';

describe('StageExecutor', () => {
  const planner = new LayerPlanner();
  let temp: TempBuildContext;
  let root: SimulatedBuildRoot;
  let executor: StageExecutor;

  beforeEach(async () => {
    temp = await createTempBuildContext({ requirements: fixtures.manifests.fullApp });
    root = new SimulatedBuildRoot();
    executor = new StageExecutor({ root, logger: silentLogger });
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('should run the stages in a fixed order', () => {
    expect(STAGE_ORDER).toEqual([
      'InstallPermanent',
      'InstallTransient',
      'InstallDependencies',
      'RemoveTransient',
      'CopySource',
      'PrepareWritablePaths',
    ]);
  });

  it('should commit one layer per stage for the full profile', async () => {
    const plan = planner.plan('full');
    const entries = parseManifest(fixtures.manifests.fullApp);

    const layers = await executor.execute(
      temp.context,
      plan.permanentGroups,
      plan.transientGroups,
      entries,
      plan.writablePaths
    );

    expect(layers.map((layer) => [layer.stage, layer.instructions])).toEqual([
      ['InstallPermanent', ['RUN apk add --update --no-cache postgresql-client jpeg-dev']],
      [
        'InstallTransient',
        [
          'RUN apk add --update --no-cache --virtual .temp-build-deps gcc libc-dev linux-headers musl-dev postgresql-dev zlib zlib-dev',
        ],
      ],
      [
        'InstallDependencies',
        ['COPY ./requirements.txt /requirements.txt', 'RUN pip install -r /requirements.txt'],
      ],
      ['RemoveTransient', ['RUN apk del .temp-build-deps']],
      ['CopySource', ['COPY ./src /app']],
      ['PrepareWritablePaths', ['RUN mkdir -p /vol/web/media /vol/web/static']],
    ]);
    expect(layers.map((layer) => layer.index)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('should leave only permanent packages installed', async () => {
    const plan = planner.plan('full');

    await executor.execute(
      temp.context,
      plan.permanentGroups,
      plan.transientGroups,
      parseManifest(fixtures.manifests.fullApp)
    );

    expect(root.listPackages()).toEqual(['jpeg-dev', 'postgresql-client']);
    expect(root.listDependencies().map((entry) => entry.name)).toEqual([
      'django',
      'psycopg2',
      'pillow',
    ]);
  });

  it('should keep transient members that were already installed', async () => {
    root = new SimulatedBuildRoot({ basePackages: ['zlib'] });
    executor = new StageExecutor({ root, logger: silentLogger });
    const plan = planner.plan('full');

    const layers = await executor.execute(
      temp.context,
      plan.permanentGroups,
      plan.transientGroups,
      parseManifest(fixtures.manifests.fullApp)
    );

    expect(root.hasPackage('zlib')).toBe(true);
    expect(root.hasPackage('zlib-dev')).toBe(false);
    expect(layers[3].changes.packagesRemoved).toEqual([
      'gcc',
      'libc-dev',
      'linux-headers',
      'musl-dev',
      'postgresql-dev',
      'zlib-dev',
    ]);
  });

  it('should not remove a permanent package that a transient group also lists', async () => {
    const layers = await executor.execute(
      temp.context,
      [{ name: 'image-runtime-libs', kind: 'permanent', members: ['jpeg-dev', 'zlib'] }],
      [{ name: 'compression-dev-libs', kind: 'transient', members: ['zlib', 'zlib-dev'] }],
      []
    );

    expect(root.listPackages()).toEqual(['jpeg-dev', 'zlib']);
    expect(layers[1].changes.packagesAdded).toEqual(['zlib-dev']);
    expect(layers[1].instructions).toEqual([
      'RUN apk add --update --no-cache --virtual .temp-build-deps zlib zlib-dev',
    ]);
    expect(layers[3].changes.packagesRemoved).toEqual(['zlib-dev']);
  });

  it('should skip stages without work and say why', async () => {
    const plan = planner.plan('minimal');
    const skipped: Array<[string, string]> = [];
    executor.on('stage:skipped', ({ stage, reason }) => skipped.push([stage, reason]));

    const layers = await executor.execute(
      temp.context,
      plan.permanentGroups,
      plan.transientGroups,
      parseManifest(fixtures.manifests.flask),
      plan.writablePaths
    );

    expect(layers.map((layer) => layer.stage)).toEqual(['InstallDependencies', 'CopySource']);
    expect(skipped).toEqual([
      ['InstallPermanent', 'no permanent package groups'],
      ['InstallTransient', 'no transient package groups'],
      ['RemoveTransient', 'no transient package groups'],
      ['PrepareWritablePaths', 'no writable paths declared'],
    ]);
  });

  it('should emit start and complete events for each committed stage', async () => {
    const plan = planner.plan('database-only');
    const events: string[] = [];
    executor.on('stage:start', ({ stage }) => events.push(`start:${stage}`));
    executor.on('stage:complete', ({ stage, layer }) => events.push(`complete:${stage}:${layer.index}`));

    await executor.execute(
      temp.context,
      plan.permanentGroups,
      plan.transientGroups,
      parseManifest(fixtures.manifests.databaseApp)
    );

    expect(events).toEqual([
      'start:InstallPermanent',
      'complete:InstallPermanent:0',
      'start:InstallTransient',
      'complete:InstallTransient:1',
      'start:InstallDependencies',
      'complete:InstallDependencies:2',
      'start:RemoveTransient',
      'complete:RemoveTransient:3',
      'start:CopySource',
      'complete:CopySource:4',
      'start:PrepareWritablePaths',
    ]);
  });

  it('should fail the dependency stage when build packages are missing', async () => {
    const plan = planner.plan('minimal');

    const run = executor.execute(
      temp.context,
      plan.permanentGroups,
      plan.transientGroups,
      parseManifest(fixtures.manifests.pillow)
    );

    await expect(run).rejects.toThrow(StageFailedError);
    await expect(run).rejects.toMatchObject({
      state: 'InstallDependencies',
      message:
        'Stage InstallDependencies failed: Building pillow requires gcc, musl-dev, zlib-dev, jpeg-dev, which are not installed',
    });
    expect(root.layers).toEqual([]);
  });

  it('should keep layers committed before a failure', async () => {
    const plan = planner.plan('database-only');

    await expect(
      executor.execute(
        temp.context,
        plan.permanentGroups,
        plan.transientGroups,
        parseManifest(fixtures.manifests.pillow)
      )
    ).rejects.toThrow(
      'Stage InstallDependencies failed: Building pillow requires zlib-dev, jpeg-dev, which are not installed'
    );
    expect(root.layers.map((layer) => layer.stage)).toEqual(['InstallPermanent', 'InstallTransient']);
  });

  it('should fail the copy stage when the source directory is missing', async () => {
    const plan = planner.plan('minimal');
    const context = { ...temp.context, sourceDirectory: `${temp.directory}/missing` };

    await expect(
      executor.execute(context, plan.permanentGroups, plan.transientGroups, [])
    ).rejects.toMatchObject({ state: 'CopySource' });
  });

  it('should use the configured virtual package name', async () => {
    const plan = planner.plan('database-only');
    executor = new StageExecutor({ root, logger: silentLogger, virtualPackageName: '.build-deps' });

    const layers = await executor.execute(
      temp.context,
      plan.permanentGroups,
      plan.transientGroups,
      []
    );

    expect(layers[1].instructions).toEqual([
      'RUN apk add --update --no-cache --virtual .build-deps gcc libc-dev linux-headers musl-dev postgresql-dev',
    ]);
    expect(layers[3].instructions).toEqual(['RUN apk del .build-deps']);
  });
});
