import type {
  ExternalDependency,
  LocalDependency,
  PackageAnalysis,
  PackageIssue
} from '../types';
import { includesAny, splitLines } from '../utils';
import { isTreeGlyph, parseDependencyLine } from './dependencyLine';

const HEADER_MARKERS = ['Dependencies:', 'Package:'];
const PROBLEM_WORDS = ['error', 'failed', 'warning'];
const UNSTABLE_BRANCHES = ['main', 'master', 'develop'];
const CYCLE_WORDS = ['circular', 'cycle', 'loop'];

interface TreeScan {
  dependencies: ExternalDependency[];
  localDependencies: LocalDependency[];
  issues: PackageIssue[];
}

export function parseShowDependencies(input: string): PackageAnalysis {
  const lines = splitLines(input);
  const scan = scanTree(lines);
  const issues = [...scan.issues, ...checkVersions(scan.dependencies)];

  const external: ExternalDependency[] = [];
  const local: LocalDependency[] = [...scan.localDependencies];
  for (const dep of scan.dependencies) {
    if (dep.url !== undefined || (dep.version !== '' && dep.version !== 'unspecified')) {
      external.push(dep);
    } else if (dep.version === 'unspecified') {
      local.push({ name: dep.name, path: dep.name });
    }
  }

  const circularImports = detectCycles(input, lines);
  if (circularImports) {
    issues.push({
      type: 'circular_import',
      severity: 'error',
      message: 'Circular dependency detected in package graph'
    });
  }

  const hasErrors = issues.some((issue) => issue.severity === 'error' || issue.severity === 'critical');
  return {
    command: 'show-dependencies',
    success: !hasErrors,
    dependencies: {
      count: external.length + local.length,
      external,
      local,
      circularImports,
      versionConflicts: []
    },
    issues
  };
}

function scanTree(lines: string[]): TreeScan {
  const scan: TreeScan = { dependencies: [], localDependencies: [], issues: [] };

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    const lower = trimmed.toLowerCase();
    if (!trimmed || includesAny(trimmed, HEADER_MARKERS) || lower.includes('no dependencies')) return;

    if (includesAny(lower, PROBLEM_WORDS)) {
      scan.issues.push({
        type: 'dependency_error',
        severity: lower.includes('error') ? 'error' : 'warning',
        message: trimmed,
        line: index + 1
      });
      return;
    }

    const dep = parseDependencyLine(trimmed);
    if (dep) {
      scan.dependencies.push(dep);
    } else if (!isTreeGlyph(trimmed[0]) && (trimmed.includes('/') || trimmed.includes('\\'))) {
      scan.localDependencies.push({ name: trimmed, path: trimmed });
    }
  });

  return scan;
}

function checkVersions(dependencies: ExternalDependency[]): PackageIssue[] {
  const issues: PackageIssue[] = [];
  const groups = new Map<string, ExternalDependency[]>();
  for (const dep of dependencies) {
    const group = groups.get(dep.name);
    if (group) group.push(dep);
    else groups.set(dep.name, [dep]);
  }

  for (const [name, deps] of groups) {
    const versions = Array.from(new Set(deps.map((dep) => dep.version)));
    if (versions.length > 1) {
      issues.push({
        type: 'version_conflict',
        severity: 'warning',
        message: `Multiple versions of ${name}: ${versions.join(', ')}`
      });
    }

    for (const dep of deps) {
      if (includesAny(dep.version.toLowerCase(), UNSTABLE_BRANCHES)) {
        issues.push({
          type: 'version_conflict',
          severity: 'info',
          target: dep.name,
          message: `Using branch '${dep.version}' may cause instability`
        });
      }
    }
  }

  return issues;
}

// Heuristic only: keyword scan plus "same name listed twice".
function detectCycles(input: string, lines: string[]): boolean {
  if (includesAny(input.toLowerCase(), CYCLE_WORDS)) return true;

  const seen = new Set<string>();
  for (const line of lines) {
    const dep = parseDependencyLine(line);
    if (!dep) continue;
    if (seen.has(dep.name)) return true;
    seen.add(dep.name);
  }
  return false;
}
