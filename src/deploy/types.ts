/**
 * Deploy Pipeline Types
 *
 * App manifest, packaged artifact, packaging-tool contract and the
 * per-attempt Deployment record.
 */

import { z } from 'zod';
import type { ErrorKind, Stage } from '../core/errors.js';

// ═══════════════════════════════════════════════════════════════
// MANIFEST
// ═══════════════════════════════════════════════════════════════

const REVERSE_DNS = /^[A-Za-z][A-Za-z0-9]*(\.[A-Za-z0-9][A-Za-z0-9-]*)+$/;
const SEMVER = /^\d+\.\d+\.\d+$/;

/**
 * `appinfo.json` — fields the packaging tool needs. Unknown keys are kept
 * and forwarded to the tool untouched.
 */
export const AppManifestSchema = z
  .object({
    /** Reverse-DNS application identifier, e.g. com.example.foo */
    id: z.string({ required_error: 'required' }).regex(REVERSE_DNS, 'must be a reverse-DNS identifier'),
    version: z.string({ required_error: 'required' }).regex(SEMVER, 'must be MAJOR.MINOR.PATCH'),
    /** Entry point, relative to the source directory */
    main: z.string({ required_error: 'required' }).min(1, 'must not be empty'),
    /** Icon file, relative to the source directory */
    icon: z.string({ required_error: 'required' }).min(1, 'must not be empty'),
    title: z.string().optional(),
    vendor: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

export type AppManifest = z.infer<typeof AppManifestSchema>;

// ═══════════════════════════════════════════════════════════════
// ARTIFACT
// ═══════════════════════════════════════════════════════════════

export const ArtifactSchema = z.object({
  packageId: z.string().min(1),
  version: z.string().min(1),
  /** Absolute path of the installable file */
  path: z.string().min(1),
  /** sha256 of the file, hex */
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
  size: z.number().int().nonnegative(),
  createdAt: z.string(),
});

/** Immutable once produced; the deploy step re-verifies `checksum` */
export type Artifact = Readonly<z.infer<typeof ArtifactSchema>>;

// ═══════════════════════════════════════════════════════════════
// PACKAGING TOOL
// ═══════════════════════════════════════════════════════════════

export interface PackageToolRequest {
  sourceDir: string;
  /** appinfo.json written by the packager */
  manifestPath: string;
  /** Empty directory the tool must leave exactly one artifact in */
  outDir: string;
  signal?: AbortSignal;
}

export interface PackageToolResult {
  exitCode: number;
  /** Combined stdout/stderr */
  output: string;
}

/**
 * The external packaging step. Exits non-zero with diagnostics on failure.
 */
export interface PackageTool {
  run(request: PackageToolRequest): Promise<PackageToolResult>;
}

// ═══════════════════════════════════════════════════════════════
// DEPLOYMENT
// ═══════════════════════════════════════════════════════════════

export const DEPLOYMENT_STATUSES = ['Pending', 'Installing', 'Launching', 'Running', 'Failed'] as const;

export type DeploymentStatus = (typeof DEPLOYMENT_STATUSES)[number];

export type FailureReason = ErrorKind | 'Unexpected';

export interface DeploymentTransition {
  status: DeploymentStatus;
  /** ISO timestamp */
  at: string;
}

export interface Deployment {
  id: string;
  alias: string;
  artifact: Artifact;
  status: DeploymentStatus;
  /** Install attempts made (0 when install never started) */
  attempts: number;
  /** Set when status is Failed */
  reason?: FailureReason;
  error?: string;
  stage?: Stage;
  diagnostic?: string;
  transitions: DeploymentTransition[];
  startedAt: string;
  finishedAt?: string;
  durationMs?: number;
}

export const DeploymentRecordSchema = z.object({
  id: z.string(),
  alias: z.string(),
  artifact: ArtifactSchema,
  status: z.enum(DEPLOYMENT_STATUSES),
  attempts: z.number().int().nonnegative(),
  reason: z.string().optional(),
  error: z.string().optional(),
  stage: z.string().optional(),
  diagnostic: z.string().optional(),
  transitions: z.array(z.object({ status: z.enum(DEPLOYMENT_STATUSES), at: z.string() })),
  startedAt: z.string(),
  finishedAt: z.string().optional(),
  durationMs: z.number().optional(),
});

/** One line of the deployment history file */
export type DeploymentRecord = z.infer<typeof DeploymentRecordSchema>;
