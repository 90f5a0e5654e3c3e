/**
 * Deploy Pipeline
 *
 * Barrel exports for packaging, deployment and history.
 */

export { Packager, MANIFEST_FILE } from './packager.js';
export type { PackagerOptions } from './packager.js';
export { Deployer } from './deployer.js';
export type { DeployerConfig, DeployerDeps } from './deployer.js';
export { CommandPackageTool, TIMEOUT_EXIT_CODE } from './package-tool.js';
export type { CommandPackageToolOptions } from './package-tool.js';
export { DeploymentHistory } from './history.js';
export type { HistoryQuery } from './history.js';
export { loadArtifact, readSidecar, SIDECAR_NAME } from './artifact.js';
export {
  AppManifestSchema,
  ArtifactSchema,
  DEPLOYMENT_STATUSES,
  DeploymentRecordSchema,
} from './types.js';
export type {
  AppManifest,
  Artifact,
  Deployment,
  DeploymentRecord,
  DeploymentStatus,
  DeploymentTransition,
  FailureReason,
  PackageTool,
  PackageToolRequest,
  PackageToolResult,
} from './types.js';
