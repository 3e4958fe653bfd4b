import * as path from 'path';
import type { RuntimeIdentity, WritablePath } from '@strata/core';

// Dockerfile instructions recorded on each layer, in the Alpine/pip dialect of the base image.

export function apkAdd(packages: string[], virtualName?: string): string {
  const virtual = virtualName ? ` --virtual ${virtualName}` : '';
  return `RUN apk add --update --no-cache${virtual} ${packages.join(' ')}`;
}

export function apkDel(virtualName: string): string {
  return `RUN apk del ${virtualName}`;
}

export function copy(contextDirectory: string, hostPath: string, imagePath: string): string {
  const relative = path.relative(contextDirectory, hostPath).split(path.sep).join('/');
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`${hostPath} is outside the build context ${contextDirectory}`);
  }
  return `COPY ./${relative} ${imagePath}`;
}

export function pipInstall(requirementsPath: string): string {
  return `RUN pip install -r ${requirementsPath}`;
}

export function mkdir(paths: string[]): string {
  return `RUN mkdir -p ${paths.join(' ')}`;
}

/**
 * One RUN for the runtime user: create it when `create` is set, then hand each
 * writable path over with its mode.
 */
export function reducePrivileges(
  identity: RuntimeIdentity,
  create: boolean,
  paths: WritablePath[]
): string {
  const commands: string[] = [];
  if (create) {
    commands.push(
      identity.uid !== undefined
        ? `adduser -D -u ${identity.uid} ${identity.username}`
        : `adduser -D ${identity.username}`
    );
  }

  if (paths.length > 0) {
    commands.push(
      `chown -R ${identity.username}:${identity.username} ${paths.map((p) => p.path).join(' ')}`
    );
    const byMode = new Map<number, string[]>();
    for (const writable of paths) {
      byMode.set(writable.mode, [...(byMode.get(writable.mode) ?? []), writable.path]);
    }
    for (const [mode, modePaths] of byMode) {
      commands.push(`chmod -R ${mode.toString(8)} ${modePaths.join(' ')}`);
    }
  }

  return `RUN ${commands.join(' && ')}`;
}
