import { z } from 'zod';

export const FeatureProfile = z.enum(['full', 'database-only', 'minimal']);
export type FeatureProfile = z.infer<typeof FeatureProfile>;

export const PackageGroupName = z.enum([
  'database-client',
  'image-runtime-libs',
  'compiler-toolchain',
  'database-dev-headers',
  'compression-dev-libs',
]);
export type PackageGroupName = z.infer<typeof PackageGroupName>;

export const PackageGroupKind = z.enum(['permanent', 'transient']);
export type PackageGroupKind = z.infer<typeof PackageGroupKind>;

const PackageMembers = z.array(z.string().min(1));

export const PermanentPackageGroup = z.object({
  name: PackageGroupName,
  kind: z.literal('permanent'),
  members: PackageMembers,
});
export type PermanentPackageGroup = z.infer<typeof PermanentPackageGroup>;

export const TransientPackageGroup = z.object({
  name: PackageGroupName,
  kind: z.literal('transient'),
  members: PackageMembers,
});
export type TransientPackageGroup = z.infer<typeof TransientPackageGroup>;

export const PackageGroup = z.discriminatedUnion('kind', [
  PermanentPackageGroup,
  TransientPackageGroup,
]);
export type PackageGroup = z.infer<typeof PackageGroup>;

const AbsolutePath = z.string().startsWith('/');

export const BuildContext = z.object({
  manifestPath: z.string().min(1),
  sourceDirectory: z.string().min(1),
  targetDirectory: AbsolutePath,
  // Directory that COPY instructions are relative to. Defaults to the manifest's directory.
  contextDirectory: z.string().min(1).optional(),
});
export type BuildContext = z.infer<typeof BuildContext>;

export const ManifestEntry = z.object({
  name: z.string().min(1),
  constraint: z.string().min(1), // PEP 440 specifier set, '*' when unconstrained
});
export type ManifestEntry = z.infer<typeof ManifestEntry>;

export const RuntimeIdentity = z.object({
  username: z.string().regex(/^[a-z_][a-z0-9_-]*$/),
  uid: z.number().int().min(0).optional(),
  isPrivileged: z.boolean().default(false),
});
export type RuntimeIdentity = z.infer<typeof RuntimeIdentity>;

export const WritablePath = z.object({
  path: AbsolutePath,
  mode: z.number().int().min(0).max(0o7777),
  owner: RuntimeIdentity,
});
export type WritablePath = z.infer<typeof WritablePath>;

export const BuildStage = z.enum([
  'InstallPermanent',
  'InstallTransient',
  'InstallDependencies',
  'RemoveTransient',
  'CopySource',
  'PrepareWritablePaths',
]);
export type BuildStage = z.infer<typeof BuildStage>;

// Every step that can commit a layer: the executor's stages plus privilege reduction.
export const LayerStage = z.enum([...BuildStage.options, 'ReducePrivileges']);
export type LayerStage = z.infer<typeof LayerStage>;

export const OwnershipChange = z.object({
  path: AbsolutePath,
  owner: z.string(),
  mode: z.number().int(),
});
export type OwnershipChange = z.infer<typeof OwnershipChange>;

export const LayerChanges = z.object({
  packagesAdded: z.array(z.string()),
  packagesRemoved: z.array(z.string()),
  dependenciesInstalled: z.array(ManifestEntry),
  pathsWritten: z.array(AbsolutePath),
  usersCreated: z.array(z.string()),
  ownershipChanges: z.array(OwnershipChange),
});
export type LayerChanges = z.infer<typeof LayerChanges>;

export const Layer = z.object({
  index: z.number().int().min(0),
  stage: LayerStage,
  digest: z.string().regex(/^sha256:[a-f0-9]{64}$/),
  instructions: z.array(z.string()),
  changes: LayerChanges,
});
export type Layer = z.infer<typeof Layer>;

export type LayerStack = readonly Layer[];

export const BuildPlan = z.object({
  profile: FeatureProfile,
  permanentGroups: z.array(PermanentPackageGroup),
  transientGroups: z.array(TransientPackageGroup),
  writablePaths: z.array(WritablePath),
});
export type BuildPlan = z.infer<typeof BuildPlan>;

export const Image = z.object({
  id: z.string().regex(/^sha256:[a-f0-9]{64}$/),
  profile: FeatureProfile,
  baseImage: z.string(),
  layers: z.array(Layer),
  packageGroups: z.array(PermanentPackageGroup),
  installedPackages: z.array(z.string()),
  dependencies: z.array(ManifestEntry),
  writablePaths: z.array(WritablePath),
  workingDirectory: AbsolutePath,
  activeUser: RuntimeIdentity,
  environment: z.record(z.string()),
  labels: z.record(z.string()),
});
export type Image = z.infer<typeof Image>;
