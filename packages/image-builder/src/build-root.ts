import * as fs from 'fs/promises';
import * as path from 'path';
import {
  IBuildRoot,
  Layer,
  LayerChanges,
  LayerStack,
  LayerStage,
  ManifestEntry,
  PathStat,
  RuntimeIdentity,
} from '@strata/core';
import { sha256Digest } from './digest';
import { NATIVE_BUILD_REQUIREMENTS } from './profiles';

export interface SimulatedBuildRootOptions {
  basePackages?: string[];
  nativeBuildRequirements?: Record<string, string[]>;
}

const ROOT_USER: RuntimeIdentity = { username: 'root', uid: 0, isPrivileged: true };
const FIRST_UNPRIVILEGED_UID = 1000;

/**
 * In-process model of an image filesystem: package database, installed Python
 * distributions, users, and a file tree with owner and mode bits.
 *
 * Installing a distribution that compiles native code fails unless its build
 * packages are installed at that moment, which is what makes stage ordering
 * observable.
 */
export class SimulatedBuildRoot implements IBuildRoot {
  private packages = new Set<string>();
  private dependencies = new Map<string, ManifestEntry>();
  private paths = new Map<string, PathStat>([['/', { type: 'directory', owner: 'root', mode: 0o755 }]]);
  private users = new Map<string, RuntimeIdentity>([[ROOT_USER.username, ROOT_USER]]);
  private nativeBuildRequirements: Record<string, string[]>;
  private committed: Layer[] = [];
  private pending: LayerChanges = emptyChanges();

  constructor(options: SimulatedBuildRootOptions = {}) {
    for (const name of options.basePackages ?? []) {
      this.packages.add(name);
    }
    this.nativeBuildRequirements = options.nativeBuildRequirements ?? NATIVE_BUILD_REQUIREMENTS;
  }

  get layers(): LayerStack {
    return [...this.committed];
  }

  hasPackage(name: string): boolean {
    return this.packages.has(name);
  }

  listPackages(): string[] {
    return [...this.packages].sort();
  }

  addPackages(names: string[]): void {
    for (const name of names) {
      if (this.packages.has(name)) {
        continue;
      }
      this.packages.add(name);
      this.pending.packagesAdded.push(name);
    }
  }

  removePackages(names: string[]): void {
    for (const name of names) {
      if (!this.packages.delete(name)) {
        throw new Error(`Package ${name} is not installed`);
      }
      this.pending.packagesRemoved.push(name);
    }
  }

  listDependencies(): ManifestEntry[] {
    return [...this.dependencies.values()];
  }

  installDependency(entry: ManifestEntry): void {
    const required = this.nativeBuildRequirements[entry.name] ?? [];
    const missing = required.filter((name) => !this.packages.has(name));
    if (missing.length > 0) {
      throw new Error(
        `Building ${entry.name} requires ${missing.join(', ')}, which ${
          missing.length === 1 ? 'is' : 'are'
        } not installed`
      );
    }

    this.dependencies.set(entry.name, { ...entry });
    this.pending.dependenciesInstalled.push({ ...entry });
  }

  writeFile(filePath: string): void {
    const target = normalizeImagePath(filePath);
    this.makeDirectory(path.posix.dirname(target));
    this.paths.set(target, { type: 'file', owner: 'root', mode: 0o644 });
    this.pending.pathsWritten.push(target);
  }

  async copyTree(hostDirectory: string, targetDirectory: string): Promise<void> {
    const stat = await fs.stat(hostDirectory).catch(() => undefined);
    if (!stat?.isDirectory()) {
      throw new Error(`Source directory not found: ${hostDirectory}`);
    }

    const target = normalizeImagePath(targetDirectory);
    this.makeDirectory(target);
    await this.copyEntries(hostDirectory, target);
  }

  makeDirectory(directoryPath: string): void {
    const target = normalizeImagePath(directoryPath);
    const existing = this.paths.get(target);
    if (existing) {
      if (existing.type !== 'directory') {
        throw new Error(`Cannot create directory ${target}: a file exists at that path`);
      }
      return;
    }

    this.makeDirectory(path.posix.dirname(target));
    this.paths.set(target, { type: 'directory', owner: 'root', mode: 0o755 });
    this.pending.pathsWritten.push(target);
  }

  stat(targetPath: string): PathStat | undefined {
    const stat = this.paths.get(normalizeImagePath(targetPath));
    return stat ? { ...stat } : undefined;
  }

  /** Recursive, like `chown -R owner:owner path && chmod -R mode path`. */
  setOwnership(targetPath: string, owner: string, mode: number): void {
    const target = normalizeImagePath(targetPath);
    if (!this.paths.has(target)) {
      throw new Error(`No such path: ${target}`);
    }
    if (!this.users.has(owner)) {
      throw new Error(`No such user: ${owner}`);
    }

    for (const [entryPath, stat] of this.paths) {
      if (entryPath === target || entryPath.startsWith(`${target}/`)) {
        this.paths.set(entryPath, { ...stat, owner, mode });
      }
    }
    this.pending.ownershipChanges.push({ path: target, owner, mode });
  }

  getUser(username: string): RuntimeIdentity | undefined {
    const user = this.users.get(username);
    return user ? { ...user } : undefined;
  }

  addUser(identity: RuntimeIdentity): RuntimeIdentity {
    if (this.users.has(identity.username)) {
      throw new Error(`User ${identity.username} already exists`);
    }

    const created: RuntimeIdentity = {
      username: identity.username,
      uid: identity.uid ?? this.nextUid(),
      isPrivileged: identity.isPrivileged,
    };
    this.users.set(created.username, created);
    this.pending.usersCreated.push(created.username);
    return { ...created };
  }

  hasPendingChanges(): boolean {
    return Object.values(this.pending).some((changes) => changes.length > 0);
  }

  commit(stage: LayerStage, instructions: string[]): Layer {
    const changes = this.pending;
    this.pending = emptyChanges();

    const layer: Layer = {
      index: this.committed.length,
      stage,
      digest: sha256Digest({ stage, instructions, changes }),
      instructions: [...instructions],
      changes,
    };
    this.committed.push(layer);
    return layer;
  }

  private async copyEntries(hostDirectory: string, targetDirectory: string): Promise<void> {
    const entries = await fs.readdir(hostDirectory, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const hostPath = path.join(hostDirectory, entry.name);
      const target = path.posix.join(targetDirectory, entry.name);

      if (entry.isDirectory()) {
        this.paths.set(target, { type: 'directory', owner: 'root', mode: 0o755 });
        this.pending.pathsWritten.push(target);
        await this.copyEntries(hostPath, target);
      } else if (entry.isFile()) {
        this.paths.set(target, { type: 'file', owner: 'root', mode: 0o644 });
        this.pending.pathsWritten.push(target);
      }
    }
  }

  private nextUid(): number {
    const uids = [...this.users.values()]
      .map((user) => user.uid ?? 0)
      .filter((uid) => uid >= FIRST_UNPRIVILEGED_UID);
    return uids.length > 0 ? Math.max(...uids) + 1 : FIRST_UNPRIVILEGED_UID;
  }
}

function emptyChanges(): LayerChanges {
  return {
    packagesAdded: [],
    packagesRemoved: [],
    dependenciesInstalled: [],
    pathsWritten: [],
    usersCreated: [],
    ownershipChanges: [],
  };
}

export function normalizeImagePath(value: string): string {
  if (!value.startsWith('/')) {
    throw new Error(`Image paths must be absolute: ${value}`);
  }
  const normalized = path.posix.normalize(value);
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}
