import Docker from 'dockerode';
import { StringDecoder } from 'string_decoder';
import * as tar from 'tar-fs';
import pino, { type Logger } from 'pino';
import { z } from 'zod';
import type { Image } from '@strata/core';
import { renderDockerfile } from './dockerfile';
import type { DockerBuildResult, DockerEngine } from './types';

const BuildProgressEvent = z
  .object({
    stream: z.string().optional(),
    status: z.string().optional(),
    error: z.string().optional(),
    errorDetail: z.object({ message: z.string().optional() }).optional(),
    aux: z.object({ ID: z.string().optional() }).optional(),
  })
  .passthrough();
type BuildProgressEvent = z.infer<typeof BuildProgressEvent>;

export interface DockerImageBuilderOptions {
  socketPath?: string;
  docker?: DockerEngine;
  logger?: Logger;
  platform?: string;
  dockerfileName?: string;
}

export class DockerBuildError extends Error {
  constructor(message: string, public readonly log: string[]) {
    super(message);
    this.name = 'DockerBuildError';
  }
}

/**
 * Builds a finalized image with a Docker engine: the rendered Dockerfile is
 * appended to a tar of the build context and streamed to the engine.
 */
export class DockerImageBuilder {
  private docker: DockerEngine;
  private logger: Logger;
  private platform?: string;
  private dockerfileName: string;

  constructor(options: DockerImageBuilderOptions = {}) {
    this.docker = options.docker ?? dockerodeEngine(options.socketPath);
    this.logger = options.logger ?? pino({ name: 'docker-image-builder' });
    this.platform = options.platform;
    this.dockerfileName = options.dockerfileName ?? 'Dockerfile.strata';
  }

  async build(image: Image, contextDirectory: string, tag: string): Promise<DockerBuildResult> {
    const dockerfile = renderDockerfile(image);
    const dockerfileName = this.dockerfileName;

    const context = tar.pack(contextDirectory, {
      finalize: false,
      finish: (pack) => {
        pack.entry({ name: dockerfileName }, dockerfile);
        pack.finalize();
      },
    });

    this.logger.info({ tag, imageId: image.id, contextDirectory }, 'Sending build context to Docker');
    const stream = await this.docker.buildImage(context, {
      t: tag,
      dockerfile: dockerfileName,
      labels: {
        ...image.labels,
        'strata.image-id': image.id,
        'strata.profile': image.profile,
      },
      ...(this.platform ? { platform: this.platform } : {}),
    });

    const events = await readProgress(stream);
    const log = events
      .map((event) => event.stream?.trimEnd() ?? event.status ?? '')
      .filter((line) => line.length > 0);

    const failure = events.find((event) => event.error !== undefined || event.errorDetail !== undefined);
    if (failure) {
      const message = failure.errorDetail?.message ?? failure.error ?? 'unknown error';
      this.logger.error({ tag, message }, 'Docker build failed');
      throw new DockerBuildError(`Docker build of ${tag} failed: ${message}`, log);
    }

    const imageId = events.reduce<string | undefined>((id, event) => event.aux?.ID ?? id, undefined);
    this.logger.info({ tag, dockerImageId: imageId }, 'Docker build complete');

    return { tag, imageId, dockerfile, log };
  }
}

function dockerodeEngine(socketPath?: string): DockerEngine {
  const docker = socketPath ? new Docker({ socketPath }) : new Docker();
  return {
    buildImage: (context, options) => docker.buildImage(context, options),
  };
}

async function readProgress(stream: NodeJS.ReadableStream): Promise<BuildProgressEvent[]> {
  const events: BuildProgressEvent[] = [];
  // Keeps a multibyte character split across chunks intact.
  const decoder = new StringDecoder('utf8');
  let buffered = '';

  for await (const chunk of stream) {
    buffered += typeof chunk === 'string' ? chunk : decoder.write(chunk);
    const lines = buffered.split('\n');
    buffered = lines.pop() ?? '';
    for (const line of lines) {
      pushProgressLine(events, line);
    }
  }
  pushProgressLine(events, buffered + decoder.end());

  return events;
}

function pushProgressLine(events: BuildProgressEvent[], line: string): void {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    events.push({ stream: trimmed });
    return;
  }

  const result = BuildProgressEvent.safeParse(parsed);
  events.push(result.success ? result.data : { stream: trimmed });
}
