import type {
  BuildContext,
  BuildPlan,
  FeatureProfile,
  Image,
  Layer,
  LayerStack,
  LayerStage,
  ManifestEntry,
  PermanentPackageGroup,
  RuntimeIdentity,
  TransientPackageGroup,
  WritablePath,
} from './types';

export interface PathStat {
  type: 'file' | 'directory';
  owner: string;
  mode: number;
}

/**
 * The filesystem a build mutates. Changes accumulate until `commit()` seals
 * them into an append-only layer; committed layers are never rewritten.
 */
export interface IBuildRoot {
  readonly layers: LayerStack;

  hasPackage(name: string): boolean;
  listPackages(): string[];
  addPackages(names: string[]): void;
  removePackages(names: string[]): void;

  listDependencies(): ManifestEntry[];
  installDependency(entry: ManifestEntry): void;

  writeFile(path: string): void;
  copyTree(hostDirectory: string, targetDirectory: string): Promise<void>;
  makeDirectory(path: string): void;
  stat(path: string): PathStat | undefined;
  setOwnership(path: string, owner: string, mode: number): void;

  getUser(username: string): RuntimeIdentity | undefined;
  addUser(identity: RuntimeIdentity): RuntimeIdentity;

  hasPendingChanges(): boolean;
  commit(stage: LayerStage, instructions: string[]): Layer;
}

export interface IManifestReader {
  read(manifestPath: string): Promise<ManifestEntry[]>;
}

export interface ILayerPlanner {
  plan(profile: FeatureProfile): BuildPlan;
}

export interface IStageExecutor {
  execute(
    context: BuildContext,
    permanentGroups: PermanentPackageGroup[],
    transientGroups: TransientPackageGroup[],
    manifestEntries: ManifestEntry[],
    writablePaths?: WritablePath[]
  ): Promise<LayerStack>;
}

export interface IPrivilegeReducer {
  reduce(identity: RuntimeIdentity, paths: WritablePath[]): Promise<void>;
}

export interface FinalizeMetadata {
  profile: FeatureProfile;
  baseImage: string;
  packageGroups: PermanentPackageGroup[];
  writablePaths: WritablePath[];
  environment: Record<string, string>;
  labels: Record<string, string>;
}

export interface IArtifactFinalizer {
  finalize(
    layers: LayerStack,
    workingDirectory: string,
    activeUser: RuntimeIdentity,
    metadata: FinalizeMetadata
  ): Image;
}
