import type { Image } from '@strata/core';

const PLAIN_VALUE = /^[A-Za-z0-9_./:,@+=-]*$/;

/**
 * Renders a finalized image as the Dockerfile that reproduces it: base image,
 * labels and environment first, then every layer's instructions in commit
 * order, then the runtime working directory and user.
 */
export function renderDockerfile(image: Image): string {
  const lines: string[] = [`FROM ${image.baseImage}`];

  for (const [key, value] of Object.entries(image.labels)) {
    lines.push(`LABEL ${key}=${JSON.stringify(value)}`);
  }

  const environment = Object.entries(image.environment);
  if (environment.length > 0) {
    lines.push('');
    for (const [key, value] of environment) {
      lines.push(`ENV ${key}=${PLAIN_VALUE.test(value) ? value : JSON.stringify(value)}`);
    }
  }

  for (const layer of image.layers) {
    lines.push('', `# ${layer.stage}`, ...layer.instructions);
  }

  lines.push('', `WORKDIR ${image.workingDirectory}`, `USER ${image.activeUser.username}`);

  return `${lines.join('\n')}\n`;
}
