import {
  BuildPlan,
  ConfigError,
  FeatureProfile,
  ILayerPlanner,
  PackageGroupName,
  PermanentPackageGroup,
  RuntimeIdentity,
  TransientPackageGroup,
  WritablePath,
} from '@strata/core';
import type { GroupMemberOverrides } from './config';
import { GROUP_DEFINITIONS, PROFILES } from './profiles';

export interface LayerPlannerOptions {
  runtimeUser?: RuntimeIdentity;
  writableMode?: number;
  groupMembers?: GroupMemberOverrides;
}

/**
 * Splits OS packages by lifetime rather than by function: permanent groups
 * stay in the image, transient groups exist only while language dependencies
 * compile. Transient groups are derived from the permanent ones, never listed
 * per profile.
 */
export class LayerPlanner implements ILayerPlanner {
  private runtimeUser: RuntimeIdentity;
  private writableMode: number;
  private groupMembers: GroupMemberOverrides;

  constructor(options: LayerPlannerOptions = {}) {
    this.runtimeUser = options.runtimeUser ?? { username: 'user', isPrivileged: false };
    this.writableMode = options.writableMode ?? 0o755;
    this.groupMembers = options.groupMembers ?? {};
  }

  plan(profile: FeatureProfile): BuildPlan {
    const definition = PROFILES[profile];

    const permanentGroups: PermanentPackageGroup[] = definition.permanentGroups.map((name) => ({
      name,
      kind: 'permanent',
      members: this.membersOf(name),
    }));

    const transientGroups: TransientPackageGroup[] = deriveTransientGroupNames(
      definition.permanentGroups
    ).map((name) => ({
      name,
      kind: 'transient',
      members: this.membersOf(name),
    }));

    this.assertDisjoint(permanentGroups, transientGroups);

    const writablePaths: WritablePath[] = definition.writablePaths.map((path) => ({
      path,
      mode: this.writableMode,
      owner: { ...this.runtimeUser },
    }));

    return { profile, permanentGroups, transientGroups, writablePaths };
  }

  private membersOf(name: PackageGroupName): string[] {
    return [...(this.groupMembers[name] ?? GROUP_DEFINITIONS[name].members)];
  }

  // A package in both lifetimes would be deleted by the transient removal.
  private assertDisjoint(
    permanentGroups: PermanentPackageGroup[],
    transientGroups: TransientPackageGroup[]
  ): void {
    const permanent = new Set(permanentGroups.flatMap((group) => group.members));
    const overlap = transientGroups
      .flatMap((group) => group.members)
      .filter((member) => permanent.has(member));

    if (overlap.length > 0) {
      throw new ConfigError('Package groups overlap', [
        `Packages both permanent and transient: ${[...new Set(overlap)].join(', ')}`,
      ]);
    }
  }
}

/**
 * Ordered, de-duplicated union of the transient groups required by the given
 * permanent groups.
 */
export function deriveTransientGroupNames(permanentGroups: PackageGroupName[]): PackageGroupName[] {
  const names: PackageGroupName[] = [];
  for (const permanent of permanentGroups) {
    for (const required of GROUP_DEFINITIONS[permanent].buildRequires) {
      if (GROUP_DEFINITIONS[required].kind === 'transient' && !names.includes(required)) {
        names.push(required);
      }
    }
  }
  return names;
}
