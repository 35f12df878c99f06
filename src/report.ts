import { AnalysisFormatError } from './errors';
import { COMPLEXITY_LEVELS, DEPENDENCY_TYPES, ISSUE_TYPES, PACKAGE_COMMANDS } from './types';
import type {
  AnalysisSummary,
  DependencyAnalysis,
  ExternalDependency,
  LocalDependency,
  OutputFormat,
  PackageAnalysis,
  PackageIssue,
  PackageMetrics,
  TargetAnalysis,
  TargetDetail,
  VersionConflict
} from './types';
import { isRecord, isSeverity } from './utils';

export function renderOutput(result: PackageAnalysis, format: OutputFormat): string {
  switch (format) {
    case 'summary':
      return JSON.stringify(buildSummary(result), null, 2);
    case 'json':
    case 'detailed':
      return serializeAnalysis(result);
  }
}

export function buildSummary(result: PackageAnalysis): AnalysisSummary {
  const summary: AnalysisSummary = { command: result.command, success: result.success };
  if (result.targets) summary.targets = result.targets.count;
  if (result.dependencies) summary.dependencies = result.dependencies.count;
  if (result.issues.length > 0) summary.issues = result.issues.length;
  return summary;
}

export function serializeAnalysis(result: PackageAnalysis): string {
  return JSON.stringify(result, null, 2);
}

export function deserializeAnalysis(json: string): PackageAnalysis {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    throw new AnalysisFormatError(`Serialized analysis is not JSON: ${String(err)}`);
  }
  if (!isPackageAnalysis(value)) {
    throw new AnalysisFormatError('Serialized value does not match the package analysis shape');
  }
  return value;
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && (allowed as readonly string[]).includes(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function optional(value: unknown, guard: (v: unknown) => boolean): boolean {
  return value === undefined || guard(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isExternalDependency(value: unknown): value is ExternalDependency {
  return isRecord(value)
    && isString(value.name)
    && isString(value.version)
    && oneOf(DEPENDENCY_TYPES, value.type)
    && optional(value.url, isString);
}

function isLocalDependency(value: unknown): value is LocalDependency {
  return isRecord(value) && isString(value.name) && isString(value.path);
}

function isVersionConflict(value: unknown): value is VersionConflict {
  return isRecord(value) && isString(value.dependency) && isStringList(value.requiredVersions);
}

function isTargetDetail(value: unknown): value is TargetDetail {
  return isRecord(value)
    && isString(value.name)
    && isString(value.type)
    && isStringList(value.platforms)
    && isStringList(value.dependencies);
}

function isTargetAnalysis(value: unknown): value is TargetAnalysis {
  return isRecord(value)
    && typeof value.count === 'number'
    && typeof value.hasTestTargets === 'boolean'
    && isStringList(value.platforms)
    && isStringList(value.executables)
    && isStringList(value.libraries)
    && optional(value.filteredTarget, isString)
    && optional(value.targets, (v) => Array.isArray(v) && v.every(isTargetDetail));
}

function isDependencyAnalysis(value: unknown): value is DependencyAnalysis {
  return isRecord(value)
    && typeof value.count === 'number'
    && Array.isArray(value.external) && value.external.every(isExternalDependency)
    && Array.isArray(value.local) && value.local.every(isLocalDependency)
    && typeof value.circularImports === 'boolean'
    && Array.isArray(value.versionConflicts) && value.versionConflicts.every(isVersionConflict);
}

function isPackageIssue(value: unknown): value is PackageIssue {
  return isRecord(value)
    && oneOf(ISSUE_TYPES, value.type)
    && isSeverity(value.severity)
    && isString(value.message)
    && optional(value.target, isString)
    && optional(value.line, (v) => typeof v === 'number');
}

function isPackageMetrics(value: unknown): value is PackageMetrics {
  return isRecord(value)
    && typeof value.parseTime === 'number'
    && oneOf(COMPLEXITY_LEVELS, value.complexity)
    && optional(value.estimatedIndexTime, isString);
}

export function isPackageAnalysis(value: unknown): value is PackageAnalysis {
  return isRecord(value)
    && oneOf(PACKAGE_COMMANDS, value.command)
    && typeof value.success === 'boolean'
    && optional(value.targets, isTargetAnalysis)
    && optional(value.dependencies, isDependencyAnalysis)
    && Array.isArray(value.issues) && value.issues.every(isPackageIssue)
    && optional(value.metrics, isPackageMetrics)
    && optional(value.rawOutput, isString);
}
