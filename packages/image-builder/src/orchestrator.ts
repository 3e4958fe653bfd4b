import * as path from 'path';
import { EventEmitter } from 'eventemitter3';
import pino, { type Logger } from 'pino';
import { v4 as uuid } from 'uuid';
import {
  BuildContext,
  BuildPlan,
  FeatureProfile,
  IArtifactFinalizer,
  ILayerPlanner,
  IManifestReader,
  Image,
  StageFailedError,
} from '@strata/core';
import { ArtifactFinalizer } from './artifact-finalizer';
import { SimulatedBuildRoot } from './build-root';
import { StrataConfig, parseConfig } from './config';
import { LayerPlanner } from './layer-planner';
import { ManifestReader } from './manifest-reader';
import { PrivilegeReducer } from './privilege-reducer';
import { StageExecutor } from './stage-executor';
import type { BuildEvents, BuildOutcome, BuildRequest, BuildRootFactory } from './types';

export interface BuildOrchestratorOptions {
  config?: StrataConfig;
  logger?: Logger;
  manifestReader?: IManifestReader;
  planner?: ILayerPlanner;
  finalizer?: IArtifactFinalizer;
  createRoot?: BuildRootFactory;
}

/**
 * Builds runtime images: manifest → plan → stages → privilege reduction →
 * finalize. Each build gets its own build root, so independent builds can run
 * concurrently.
 */
export class BuildOrchestrator extends EventEmitter<BuildEvents> {
  private config: StrataConfig;
  private logger: Logger;
  private manifestReader: IManifestReader;
  private planner: ILayerPlanner;
  private finalizer: IArtifactFinalizer;
  private createRoot: BuildRootFactory;

  constructor(options: BuildOrchestratorOptions = {}) {
    super();
    this.config = options.config ?? parseConfig({});
    this.logger = options.logger ?? pino({ name: 'build-orchestrator' });
    this.manifestReader = options.manifestReader ?? new ManifestReader({ logger: this.logger });
    this.planner =
      options.planner ??
      new LayerPlanner({
        runtimeUser: this.config.runtimeUser,
        writableMode: this.config.writableMode,
        groupMembers: this.config.groupMembers,
      });
    this.finalizer = options.finalizer ?? new ArtifactFinalizer();
    this.createRoot =
      options.createRoot ??
      (() => new SimulatedBuildRoot({ nativeBuildRequirements: this.config.nativeBuildRequirements }));
  }

  plan(profile: FeatureProfile): BuildPlan {
    return this.planner.plan(profile);
  }

  /**
   * Resolves a build context against a directory using the configured
   * manifest and source locations.
   */
  resolveContext(contextDirectory: string): BuildContext {
    return Object.freeze({
      manifestPath: path.resolve(contextDirectory, this.config.manifestPath),
      sourceDirectory: path.resolve(contextDirectory, this.config.sourceDirectory),
      targetDirectory: this.config.workingDirectory,
      contextDirectory: path.resolve(contextDirectory),
    });
  }

  /**
   * The image's working directory is `context.targetDirectory`, which
   * `resolveContext` takes from the configured `workingDirectory`.
   */
  async build(context: BuildContext, profile: FeatureProfile): Promise<Image> {
    const buildId = uuid();
    const startTime = Date.now();
    const logger = this.logger.child({ buildId, profile });

    this.emit('build:start', { buildId, profile });
    logger.info({ context }, 'Build started');

    try {
      const frozenContext = Object.freeze({ ...context });
      const plan = this.planner.plan(profile);
      const entries = await this.manifestReader.read(frozenContext.manifestPath);

      const root = this.createRoot();
      const executor = new StageExecutor({
        root,
        logger,
        virtualPackageName: this.config.virtualPackageName,
      });
      executor.on('stage:start', ({ stage }) => this.emit('stage:start', { buildId, stage }));
      executor.on('stage:complete', ({ stage, layer }) =>
        this.emit('stage:complete', { buildId, stage, layer })
      );
      executor.on('stage:skipped', ({ stage, reason }) =>
        this.emit('stage:skipped', { buildId, stage, reason })
      );

      await executor.execute(
        frozenContext,
        plan.permanentGroups,
        plan.transientGroups,
        entries,
        plan.writablePaths
      );

      this.emit('stage:start', { buildId, stage: 'ReducePrivileges' });
      const layersBefore = root.layers.length;
      await new PrivilegeReducer({ root, logger }).reduce(this.config.runtimeUser, plan.writablePaths);
      const layers = root.layers;
      if (layers.length > layersBefore) {
        this.emit('stage:complete', {
          buildId,
          stage: 'ReducePrivileges',
          layer: layers[layers.length - 1],
        });
      }

      const activeUser = root.getUser(this.config.runtimeUser.username);
      if (!activeUser) {
        throw new StageFailedError(
          'ReducePrivileges',
          new Error(`Runtime user ${this.config.runtimeUser.username} was not created`)
        );
      }

      const image = this.finalizer.finalize(layers, frozenContext.targetDirectory, activeUser, {
        profile,
        baseImage: this.config.baseImage,
        packageGroups: plan.permanentGroups,
        writablePaths: plan.writablePaths.map((writable) => ({ ...writable, owner: activeUser })),
        environment: this.config.environment,
        labels: this.config.labels,
      });

      const durationMs = Date.now() - startTime;
      logger.info({ imageId: image.id, layers: image.layers.length, durationMs }, 'Build complete');
      this.emit('build:complete', { buildId, image, durationMs });
      return image;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      logger.error({ err: failure }, 'Build failed');
      this.emit('build:failed', { buildId, profile, error: failure });
      throw failure;
    }
  }

  /**
   * Builds independent contexts in parallel. Every build runs to completion;
   * one outcome is returned per request, in request order.
   */
  async buildAll(requests: BuildRequest[]): Promise<BuildOutcome[]> {
    const results = await Promise.allSettled(
      requests.map((request) => this.build(request.context, request.profile))
    );
    return results.map((result, index): BuildOutcome => {
      const request = requests[index];
      if (result.status === 'fulfilled') {
        return { status: 'built', request, image: result.value };
      }
      const error = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
      return { status: 'failed', request, error };
    });
  }
}
