import type {
  BuildContext,
  BuildStage,
  FeatureProfile,
  IBuildRoot,
  Image,
  Layer,
  LayerStage,
} from '@strata/core';

export interface StageEvents {
  'stage:start': (event: { stage: LayerStage }) => void;
  'stage:complete': (event: { stage: LayerStage; layer: Layer }) => void;
  'stage:skipped': (event: { stage: BuildStage; reason: string }) => void;
}

export interface BuildEvents {
  'build:start': (event: { buildId: string; profile: FeatureProfile }) => void;
  'stage:start': (event: { buildId: string; stage: LayerStage }) => void;
  'stage:complete': (event: { buildId: string; stage: LayerStage; layer: Layer }) => void;
  'stage:skipped': (event: { buildId: string; stage: BuildStage; reason: string }) => void;
  'build:complete': (event: { buildId: string; image: Image; durationMs: number }) => void;
  'build:failed': (event: { buildId: string; profile: FeatureProfile; error: Error }) => void;
}

export interface BuildRequest {
  context: BuildContext;
  profile: FeatureProfile;
}

export type BuildOutcome =
  | { status: 'built'; request: BuildRequest; image: Image }
  | { status: 'failed'; request: BuildRequest; error: Error };

export type BuildRootFactory = () => IBuildRoot;

export interface DockerBuildOptions {
  t: string;
  dockerfile: string;
  labels: Record<string, string>;
  platform?: string;
}

/** The slice of the Docker engine API the image builder drives. */
export interface DockerEngine {
  buildImage(context: NodeJS.ReadableStream, options: DockerBuildOptions): Promise<NodeJS.ReadableStream>;
}

export interface DockerBuildResult {
  tag: string;
  imageId?: string;
  dockerfile: string;
  log: string[];
}
