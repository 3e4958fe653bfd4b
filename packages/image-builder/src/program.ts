import * as fs from 'fs/promises';
import * as path from 'path';
import { Command, Option } from 'commander';
import pino, { type Logger } from 'pino';
import { BuildError, FeatureProfile } from '@strata/core';
import { DockerImageBuilder } from './builder';
import { loadConfig } from './config';
import { renderDockerfile } from './dockerfile';
import { BuildOrchestrator } from './orchestrator';

export interface ProgramIO {
  logger: Logger;
  stdout: (text: string) => void;
}

interface CommonOptions {
  profile: string;
  config?: string;
}

interface BuildOptions extends CommonOptions {
  context: string;
}

interface DockerfileOptions extends BuildOptions {
  output?: string;
}

interface DockerBuildOptions extends BuildOptions {
  tag: string;
  platform?: string;
  socket?: string;
}

export function createProgram(io: ProgramIO = defaultIO()): Command {
  const program = new Command();

  program
    .name('strata')
    .description('Plan and build minimal, non-root runtime images for Python web applications')
    .version('0.1.0');

  const profileOption = () =>
    new Option('-p, --profile <profile>', 'Feature profile').choices(FeatureProfile.options).default('full');
  const configOption = () => new Option('-c, --config <file>', 'Load configuration from a JSON file');
  const contextOption = () =>
    new Option('--context <dir>', 'Build context directory (manifest and source live here)').default('.');

  const prepare = async (options: BuildOptions) => {
    const config = await loadConfig(options.config);
    const orchestrator = new BuildOrchestrator({ config, logger: io.logger });
    const context = orchestrator.resolveContext(path.resolve(options.context));
    return { orchestrator, context, profile: FeatureProfile.parse(options.profile) };
  };

  program
    .command('plan')
    .description('Print the package groups and writable paths a profile selects')
    .addOption(profileOption())
    .addOption(configOption())
    .action(async (options: CommonOptions) => {
      const config = await loadConfig(options.config);
      const orchestrator = new BuildOrchestrator({ config, logger: io.logger });
      const plan = orchestrator.plan(FeatureProfile.parse(options.profile));
      io.stdout(`${JSON.stringify(plan, null, 2)}\n`);
    });

  program
    .command('build')
    .description('Run the build against the simulated build root and print the image')
    .addOption(profileOption())
    .addOption(configOption())
    .addOption(contextOption())
    .action(async (options: BuildOptions) => {
      const { orchestrator, context, profile } = await prepare(options);
      const image = await orchestrator.build(context, profile);
      io.stdout(`${JSON.stringify(image, null, 2)}\n`);
    });

  program
    .command('dockerfile')
    .description('Build and render the equivalent Dockerfile')
    .addOption(profileOption())
    .addOption(configOption())
    .addOption(contextOption())
    .option('-o, --output <file>', 'Write the Dockerfile to a file instead of stdout')
    .action(async (options: DockerfileOptions) => {
      const { orchestrator, context, profile } = await prepare(options);
      const dockerfile = renderDockerfile(await orchestrator.build(context, profile));
      if (options.output) {
        await fs.writeFile(options.output, dockerfile);
        io.logger.info({ output: options.output }, 'Dockerfile written');
      } else {
        io.stdout(dockerfile);
      }
    });

  program
    .command('docker-build')
    .description('Build the image with a Docker engine')
    .addOption(profileOption())
    .addOption(configOption())
    .addOption(contextOption())
    .requiredOption('-t, --tag <tag>', 'Image tag')
    .option('--platform <platform>', 'Target platform, e.g. linux/amd64')
    .option('--socket <path>', 'Docker engine socket path')
    .action(async (options: DockerBuildOptions) => {
      const { orchestrator, context, profile } = await prepare(options);
      const image = await orchestrator.build(context, profile);
      const builder = new DockerImageBuilder({
        socketPath: options.socket,
        platform: options.platform,
        logger: io.logger,
      });
      const result = await builder.build(image, context.contextDirectory ?? options.context, options.tag);
      io.stdout(`${JSON.stringify({ tag: result.tag, imageId: result.imageId, strataImageId: image.id }, null, 2)}\n`);
    });

  return program;
}

export function describeError(error: unknown): string {
  if (error instanceof BuildError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function defaultIO(): ProgramIO {
  return {
    logger: pino({ name: 'strata' }),
    stdout: (text) => {
      process.stdout.write(text);
    },
  };
}
