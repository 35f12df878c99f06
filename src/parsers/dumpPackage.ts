import { emptyDependencyAnalysis } from '../types';
import type {
  DependencyAnalysis,
  DependencyType,
  ExternalDependency,
  LocalDependency,
  PackageAnalysis,
  PackageIssue,
  TargetAnalysis,
  TargetDetail
} from '../types';
import { isRecord } from '../utils';
import { decodeDependency, decodePackagePlatforms, decodeTargets } from './manifestJson';
import type { DependencyEntry, TargetEntry } from './manifestJson';

// Size proxy, not a graph check.
const CIRCULAR_DEPENDENCY_THRESHOLD = 20;
const LIBRARY_KINDS = ['library', 'static-library', 'dynamic-library'];

interface Extracted<T> {
  analysis: T;
  issues: PackageIssue[];
}

/**
 * Parses `dump-package` JSON, optionally restricted to a single target.
 *
 * Accepts both the legacy flat dependency schema (`name`/`url`/`requirement`)
 * and the newer one (`sourceControl: [{ identity, location, requirement }]`).
 * Malformed JSON produces a failed result with one `syntax_error` issue.
 */
export function parseDumpPackage(input: string, targetFilter?: string): PackageAnalysis {
  let manifest: unknown;
  try {
    manifest = JSON.parse(input);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return syntaxFailure(`Failed to parse package manifest JSON: ${reason}`);
  }
  if (!isRecord(manifest)) {
    return syntaxFailure('Failed to parse package manifest JSON: top-level value is not an object');
  }

  const entries = decodeTargets(manifest);
  const platforms = decodePackagePlatforms(manifest);
  const targets = extractTargets(entries, platforms, targetFilter);
  const dependencies = extractDependencies(manifest, entries, targetFilter);

  const issues = [...targets.issues, ...dependencies.issues, ...validatePackage(manifest)];
  const retained = targetFilter !== undefined
    ? issues.filter((issue) => issue.target === undefined || issue.target === targetFilter)
    : issues;

  return {
    command: 'dump-package',
    // Only `critical` fails a manifest analysis.
    success: retained.every((issue) => issue.severity !== 'critical'),
    targets: targets.analysis,
    dependencies: dependencies.analysis,
    issues: retained
  };
}

function syntaxFailure(message: string): PackageAnalysis {
  return {
    command: 'dump-package',
    success: false,
    issues: [{ type: 'syntax_error', severity: 'error', message }]
  };
}

function extractTargets(
  entries: TargetEntry[] | undefined,
  platforms: string[],
  targetFilter?: string
): Extracted<TargetAnalysis> {
  const analysis: TargetAnalysis = {
    count: 0,
    hasTestTargets: false,
    platforms,
    executables: [],
    libraries: []
  };

  if (!entries) {
    return {
      analysis,
      issues: [{ type: 'missing_target', severity: 'warning', message: 'No targets found in package' }]
    };
  }

  const issues: PackageIssue[] = [];
  const details: TargetDetail[] = [];
  for (const entry of entries) {
    if (targetFilter !== undefined && entry.name !== targetFilter) continue;

    analysis.count += 1;
    details.push({
      name: entry.name,
      type: entry.type,
      platforms: entry.platforms,
      dependencies: entry.dependencies.map((ref) => ref.product)
    });

    const kind = entry.type.toLowerCase();
    if (kind === 'executable') analysis.executables.push(entry.name);
    else if (LIBRARY_KINDS.includes(kind)) analysis.libraries.push(entry.name);
    else if (kind === 'test') analysis.hasTestTargets = true;

    if (entry.hasEmptyDependencyList && !entry.name.toLowerCase().includes('test')) {
      issues.push({
        type: 'missing_target',
        severity: 'info',
        target: entry.name,
        message: `Target '${entry.name}' has no dependencies`
      });
    }
  }

  if (targetFilter !== undefined) {
    analysis.filteredTarget = targetFilter;
    if (details.length === 0) {
      analysis.targets = [];
      return { analysis, issues: [] };
    }
  }
  if (details.length > 0) analysis.targets = details;

  return { analysis, issues };
}

function extractDependencies(
  manifest: Record<string, unknown>,
  targets: TargetEntry[] | undefined,
  targetFilter?: string
): Extracted<DependencyAnalysis> {
  const empty: Extracted<DependencyAnalysis> = { analysis: emptyDependencyAnalysis(), issues: [] };

  let keep: (name: string) => boolean = () => true;
  if (targetFilter !== undefined) {
    const target = targets?.find((entry) => entry.name === targetFilter);
    if (!target || !target.declaresDependencies) return empty;
    // Package-level entries are keyed by package identity, target entries by product.
    const names = new Set<string>();
    for (const ref of target.dependencies) {
      names.add(ref.product);
      if (ref.package !== undefined) names.add(ref.package);
    }
    keep = (name) => names.has(name);
  }

  const raw = manifest.dependencies;
  if (!Array.isArray(raw)) return empty;

  const issues: PackageIssue[] = [];
  const external: ExternalDependency[] = [];
  const local: LocalDependency[] = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    const entry = decodeDependency(item);
    issues.push(...validateDependency(entry));

    if (!entry.name || !keep(entry.name)) continue;
    if (entry.url !== undefined) {
      external.push({ name: entry.name, version: entry.version, type: classifyUrl(entry.url), url: entry.url });
    } else if (entry.schema === 'registry') {
      external.push({ name: entry.name, version: entry.version, type: 'registry' });
    } else if (entry.path !== undefined) {
      local.push({ name: entry.name, path: entry.path });
    }
  }

  const circularImports = external.length + local.length > CIRCULAR_DEPENDENCY_THRESHOLD;
  if (circularImports) {
    issues.push({
      type: 'circular_import',
      severity: 'error',
      message: 'Potential circular dependencies detected'
    });
  }

  return {
    analysis: {
      count: external.length + local.length,
      external,
      local,
      circularImports,
      versionConflicts: []
    },
    issues
  };
}

function validateDependency(entry: DependencyEntry): PackageIssue[] {
  if (entry.missingIdentity) {
    const label = entry.schema === 'file-system' ? 'File system' : entry.schema === 'registry' ? 'Registry' : 'Source control';
    return [{ type: 'dependency_error', severity: 'error', message: `${label} dependency missing identity` }];
  }
  if (entry.schema !== 'legacy') return [];

  const issues: PackageIssue[] = [];
  if (entry.url === undefined && entry.path === undefined) {
    issues.push({ type: 'dependency_error', severity: 'error', message: 'Dependency has neither URL nor path' });
  }
  if (entry.rangeLength !== undefined && entry.rangeLength > 2) {
    issues.push({
      type: 'version_conflict',
      severity: 'warning',
      message: 'Complex version range may cause resolution issues'
    });
  }
  return issues;
}

function validatePackage(manifest: Record<string, unknown>): PackageIssue[] {
  const issues: PackageIssue[] = [];
  if (manifest.name === undefined) {
    issues.push({ type: 'syntax_error', severity: 'critical', message: "Package missing required 'name' field" });
  }
  if (manifest.products === undefined) {
    issues.push({ type: 'missing_target', severity: 'warning', message: 'Package defines no products' });
  }
  return issues;
}

export function classifyUrl(url: string): DependencyType {
  if (url.endsWith('.binary')) return 'binary';
  if (url.includes('@swift-package-registry')) return 'registry';
  return 'source-control';
}
