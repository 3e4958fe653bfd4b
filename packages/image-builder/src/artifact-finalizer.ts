import {
  FinalizationPolicyViolationError,
  FinalizeMetadata,
  IArtifactFinalizer,
  Image,
  LayerStack,
  ManifestEntry,
  RuntimeIdentity,
} from '@strata/core';
import { sha256Digest } from './digest';

export class ArtifactFinalizer implements IArtifactFinalizer {
  finalize(
    layers: LayerStack,
    workingDirectory: string,
    activeUser: RuntimeIdentity,
    metadata: FinalizeMetadata
  ): Image {
    if (activeUser.isPrivileged) {
      throw new FinalizationPolicyViolationError(
        `Refusing to finalize an image whose active user '${activeUser.username}' is privileged`
      );
    }
    if (layers.length === 0) {
      throw new FinalizationPolicyViolationError('Refusing to finalize an image with no layers');
    }

    const installed = new Set<string>();
    const dependencies = new Map<string, ManifestEntry>();
    for (const layer of layers) {
      for (const name of layer.changes.packagesAdded) {
        installed.add(name);
      }
      for (const name of layer.changes.packagesRemoved) {
        installed.delete(name);
      }
      for (const entry of layer.changes.dependenciesInstalled) {
        dependencies.set(entry.name, entry);
      }
    }

    const id = sha256Digest({
      baseImage: metadata.baseImage,
      layers: layers.map((layer) => layer.digest),
      workingDirectory,
      activeUser,
      environment: metadata.environment,
      labels: metadata.labels,
    });

    return deepFreeze(
      structuredClone({
        id,
        profile: metadata.profile,
        baseImage: metadata.baseImage,
        layers: [...layers],
        packageGroups: metadata.packageGroups,
        installedPackages: [...installed].sort(),
        dependencies: [...dependencies.values()],
        writablePaths: metadata.writablePaths,
        workingDirectory,
        activeUser,
        environment: metadata.environment,
        labels: metadata.labels,
      })
    );
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
}
