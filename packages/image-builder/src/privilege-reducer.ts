import pino, { type Logger } from 'pino';
import {
  IBuildRoot,
  IdentityCreationError,
  IPrivilegeReducer,
  RuntimeIdentity,
  StageFailedError,
  WritablePath,
} from '@strata/core';
import { reducePrivileges } from './instructions';

export interface PrivilegeReducerOptions {
  root: IBuildRoot;
  logger?: Logger;
}

export class PrivilegeReducer implements IPrivilegeReducer {
  private root: IBuildRoot;
  private logger: Logger;

  constructor(options: PrivilegeReducerOptions) {
    this.root = options.root;
    this.logger = options.logger ?? pino({ name: 'privilege-reducer' });
  }

  /**
   * Ensures `identity` exists and owns every writable path with the path's
   * mode. Must run after the paths are created and before finalization.
   */
  async reduce(identity: RuntimeIdentity, paths: WritablePath[]): Promise<void> {
    if (identity.isPrivileged) {
      throw new IdentityCreationError(identity.username, 'the runtime identity must not be privileged');
    }

    const existing = this.root.getUser(identity.username);
    if (existing) {
      this.assertCompatible(existing, identity);
    }

    try {
      const user = existing ?? this.root.addUser(identity);
      for (const writable of paths) {
        this.root.setOwnership(writable.path, user.username, writable.mode);
      }
    } catch (error) {
      throw new StageFailedError('ReducePrivileges', error);
    }

    if (!this.root.hasPendingChanges()) {
      this.logger.debug({ username: identity.username }, 'Runtime identity already in place');
      return;
    }

    const layer = this.root.commit('ReducePrivileges', [
      reducePrivileges(identity, existing === undefined, paths),
    ]);
    this.logger.info(
      { username: identity.username, writablePaths: paths.length, layer: layer.index },
      'Reduced privileges'
    );
  }

  private assertCompatible(existing: RuntimeIdentity, requested: RuntimeIdentity): void {
    if (existing.isPrivileged !== requested.isPrivileged) {
      throw new IdentityCreationError(
        requested.username,
        'a privileged user with that name already exists'
      );
    }
    if (requested.uid !== undefined && existing.uid !== requested.uid) {
      throw new IdentityCreationError(
        requested.username,
        `existing user has uid ${existing.uid ?? 'unknown'}, requested ${requested.uid}`
      );
    }
  }
}
