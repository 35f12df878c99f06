export type PackageCommand =
  | 'dump-package'
  | 'show-dependencies'
  | 'resolve'
  | 'describe'
  | 'update'
  | 'unknown';

export type DependencyType = 'source-control' | 'binary' | 'registry';

export type IssueType =
  | 'circular_import'
  | 'missing_target'
  | 'version_conflict'
  | 'platform_mismatch'
  | 'syntax_error'
  | 'dependency_error'
  | 'network_error'
  | 'unknown';

export type Severity = 'info' | 'warning' | 'error' | 'critical';
export type ComplexityLevel = 'low' | 'medium' | 'high' | 'unknown';
export type OutputFormat = 'json' | 'summary' | 'detailed';

export const PACKAGE_COMMANDS: readonly PackageCommand[] = [
  'dump-package',
  'show-dependencies',
  'resolve',
  'describe',
  'update',
  'unknown'
];

export const DEPENDENCY_TYPES: readonly DependencyType[] = ['source-control', 'binary', 'registry'];

export const ISSUE_TYPES: readonly IssueType[] = [
  'circular_import',
  'missing_target',
  'version_conflict',
  'platform_mismatch',
  'syntax_error',
  'dependency_error',
  'network_error',
  'unknown'
];

// Lowest first. Filtering and the success rules index into this.
export const SEVERITY_ORDER: readonly Severity[] = ['info', 'warning', 'error', 'critical'];

export const COMPLEXITY_LEVELS: readonly ComplexityLevel[] = ['low', 'medium', 'high', 'unknown'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'summary', 'detailed'];

export interface ExternalDependency {
  name: string;
  /** Exact version, "lower - upper", "branch: X", "revision: abcdef1" or "unspecified". */
  version: string;
  type: DependencyType;
  url?: string;
}

export interface LocalDependency {
  name: string;
  path: string;
}

export interface VersionConflict {
  dependency: string;
  requiredVersions: string[];
}

export interface TargetDetail {
  name: string;
  /** Raw `type` string from the manifest, not normalized. */
  type: string;
  platforms: string[];
  dependencies: string[];
}

export interface TargetAnalysis {
  count: number;
  hasTestTargets: boolean;
  platforms: string[];
  executables: string[];
  libraries: string[];
  filteredTarget?: string;
  targets?: TargetDetail[];
}

export interface DependencyAnalysis {
  /** external + local */
  count: number;
  external: ExternalDependency[];
  local: LocalDependency[];
  circularImports: boolean;
  // Conflicts are reported as issues; this list stays empty for the structural parsers.
  versionConflicts: VersionConflict[];
}

export interface PackageIssue {
  type: IssueType;
  severity: Severity;
  target?: string;
  message: string;
  line?: number;
}

export interface PackageMetrics {
  /** Seconds. */
  parseTime: number;
  complexity: ComplexityLevel;
  estimatedIndexTime?: string;
}

export interface PackageAnalysis {
  command: PackageCommand;
  success: boolean;
  targets?: TargetAnalysis;
  dependencies?: DependencyAnalysis;
  issues: PackageIssue[];
  metrics?: PackageMetrics;
  rawOutput?: string;
}

export interface AnalysisSummary {
  command: PackageCommand;
  success: boolean;
  targets?: number;
  dependencies?: number;
  issues?: number;
}

export interface AnalyzeOptions {
  /** Skip classification and parse as this command kind. */
  command?: PackageCommand;
  /** Restrict a dump-package analysis to one target. */
  target?: string;
  minSeverity?: Severity;
  metrics?: boolean;
  verbose?: boolean;
}

export function emptyDependencyAnalysis(): DependencyAnalysis {
  return { count: 0, external: [], local: [], circularImports: false, versionConflicts: [] };
}
