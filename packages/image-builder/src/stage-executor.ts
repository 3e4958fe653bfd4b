import * as path from 'path';
import { EventEmitter } from 'eventemitter3';
import pino, { type Logger } from 'pino';
import {
  BuildContext,
  BuildStage,
  IBuildRoot,
  IStageExecutor,
  LayerStack,
  ManifestEntry,
  PermanentPackageGroup,
  StageFailedError,
  TransientPackageGroup,
  WritablePath,
} from '@strata/core';
import { apkAdd, apkDel, copy, mkdir, pipInstall } from './instructions';
import type { StageEvents } from './types';

export const STAGE_ORDER: readonly BuildStage[] = BuildStage.options;
export const REQUIREMENTS_IMAGE_PATH = '/requirements.txt';

type StageOutcome = { instructions: string[] } | { skipped: string };

interface StageInput {
  context: BuildContext;
  contextDirectory: string;
  permanentMembers: string[];
  transientMembers: string[];
  // Transient members that were absent before InstallTransient; only these are removed.
  transientInstalled: string[];
  manifestEntries: ManifestEntry[];
  writablePaths: WritablePath[];
}

export interface StageExecutorOptions {
  root: IBuildRoot;
  logger?: Logger;
  virtualPackageName?: string;
}

/**
 * Runs the build stages in a fixed order against one build root. Each stage
 * with work commits one layer; the first failure aborts the whole run with a
 * StageFailedError and leaves committed layers as they are.
 */
export class StageExecutor extends EventEmitter<StageEvents> implements IStageExecutor {
  private root: IBuildRoot;
  private logger: Logger;
  private virtualPackageName: string;

  constructor(options: StageExecutorOptions) {
    super();
    this.root = options.root;
    this.logger = options.logger ?? pino({ name: 'stage-executor' });
    this.virtualPackageName = options.virtualPackageName ?? '.temp-build-deps';
  }

  async execute(
    context: BuildContext,
    permanentGroups: PermanentPackageGroup[],
    transientGroups: TransientPackageGroup[],
    manifestEntries: ManifestEntry[],
    writablePaths: WritablePath[] = []
  ): Promise<LayerStack> {
    const input: StageInput = {
      context,
      contextDirectory: context.contextDirectory ?? path.dirname(context.manifestPath),
      permanentMembers: unique(permanentGroups.flatMap((group) => group.members)),
      transientMembers: unique(transientGroups.flatMap((group) => group.members)),
      transientInstalled: [],
      manifestEntries,
      writablePaths,
    };

    for (const stage of STAGE_ORDER) {
      await this.runStage(stage, input);
    }

    return this.root.layers;
  }

  private async runStage(stage: BuildStage, input: StageInput): Promise<void> {
    this.emit('stage:start', { stage });

    let outcome: StageOutcome;
    try {
      outcome = await this.perform(stage, input);
    } catch (error) {
      this.logger.error({ stage, err: error }, 'Stage failed');
      throw new StageFailedError(stage, error);
    }

    if ('skipped' in outcome) {
      this.logger.debug({ stage, reason: outcome.skipped }, 'Stage skipped');
      this.emit('stage:skipped', { stage, reason: outcome.skipped });
      return;
    }

    const layer = this.root.commit(stage, outcome.instructions);
    this.logger.info({ stage, layer: layer.index, digest: layer.digest }, 'Stage complete');
    this.emit('stage:complete', { stage, layer });
  }

  private async perform(stage: BuildStage, input: StageInput): Promise<StageOutcome> {
    switch (stage) {
      case 'InstallPermanent':
        if (input.permanentMembers.length === 0) {
          return { skipped: 'no permanent package groups' };
        }
        this.root.addPackages(input.permanentMembers);
        return { instructions: [apkAdd(input.permanentMembers)] };

      case 'InstallTransient':
        if (input.transientMembers.length === 0) {
          return { skipped: 'no transient package groups' };
        }
        input.transientInstalled = input.transientMembers.filter((name) => !this.root.hasPackage(name));
        this.root.addPackages(input.transientInstalled);
        return { instructions: [apkAdd(input.transientMembers, this.virtualPackageName)] };

      case 'InstallDependencies': {
        const instructions = [
          copy(input.contextDirectory, input.context.manifestPath, REQUIREMENTS_IMAGE_PATH),
          pipInstall(REQUIREMENTS_IMAGE_PATH),
        ];
        this.root.writeFile(REQUIREMENTS_IMAGE_PATH);
        for (const entry of input.manifestEntries) {
          this.root.installDependency(entry);
        }
        return { instructions };
      }

      case 'RemoveTransient': {
        if (input.transientMembers.length === 0) {
          return { skipped: 'no transient package groups' };
        }
        this.root.removePackages(input.transientInstalled);
        const leftover = input.transientInstalled.filter((name) => this.root.hasPackage(name));
        if (leftover.length > 0) {
          throw new Error(`Transient packages still installed: ${leftover.join(', ')}`);
        }
        return { instructions: [apkDel(this.virtualPackageName)] };
      }

      case 'CopySource': {
        const instruction = copy(
          input.contextDirectory,
          input.context.sourceDirectory,
          input.context.targetDirectory
        );
        await this.root.copyTree(input.context.sourceDirectory, input.context.targetDirectory);
        return { instructions: [instruction] };
      }

      case 'PrepareWritablePaths': {
        if (input.writablePaths.length === 0) {
          return { skipped: 'no writable paths declared' };
        }
        const paths = input.writablePaths.map((writable) => writable.path);
        for (const writablePath of paths) {
          this.root.makeDirectory(writablePath);
        }
        return { instructions: [mkdir(paths)] };
      }
    }
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
