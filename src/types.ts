/**
 * Shared types for the bucket usage toolkit.
 */

// ============================================
// Subprocess Results
// ============================================

export type StepErrorType = 'none' | 'exit_error' | 'spawn_error' | 'timeout' | 'interrupted';

export interface ScriptResult {
  ok: boolean;
  exitCode: number;
  errorType: StepErrorType;
  errorMessage: string;
}

export interface AwsCliOptions {
  /** Executable to run. Default: env.AWS_CLI */
  command?: string;
  /** Arguments placed before the s3api subcommand */
  prefixArgs?: string[];
  timeout?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface AwsCliResult extends ScriptResult {
  /** Human-readable command line, for logging */
  commandLine: string;
}

// ============================================
// CLI Options
// ============================================

export type DriverArgs =
  | { kind: 'usage'; error?: string }
  | { kind: 'run'; bucket: string; humanize: boolean };

export interface FetchArgs {
  bucket: string | null;
  file: string;
  help: boolean;
  /** Set when the arguments are not usable */
  error?: string;
}

export interface ProcessArgs {
  file: string;
  humanize: boolean;
  help: boolean;
  error?: string;
}

// ============================================
// Object Summaries
// ============================================

export type ObjectStatus = 'present' | 'deleted';

export interface DeleteMarkerSummary {
  latestModified: string;
}

export interface VersionSummary {
  latestModified: string;
  totalSize: number;
  numVersions: number;
  averageSize: number;
  /** Size of the current version; unset for folders */
  latestSize?: number;
}

export interface ObjectSummary {
  latestModified: string;
  totalSize: number;
  numVersions: number;
  averageSize: number;
  latestSize?: number;
  status: ObjectStatus;
  isFolder: boolean;
}

// ============================================
// Usage Stats
// ============================================

export interface DeletedStats {
  numFiles: number;
  numVersions: number;
  totalSize: number;
  averageSize: number;
}

export interface PresentStats extends DeletedStats {
  latestSize: number;
  pctUsedByLatest: number;
}

export interface UsageStats {
  present: PresentStats;
  deleted: DeletedStats;
}

// ============================================
// Configuration
// ============================================

export interface AppConfig {
  cacheExtension: string;
  defaultListingFile: string;
  tempPrefix: string;
  killGracePeriodMs: number;
  reportLineWidths: {
    status: number;
    field: number;
  };
  scripts: {
    fetch: string;
    process: string;
  };
}
