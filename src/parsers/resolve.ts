import type { ExternalDependency, PackageAnalysis, PackageIssue } from '../types';
import { includesAny, splitLines } from '../utils';

const PACKAGE_NAME_PATTERNS = [
  /Resolving (\S+)/i,
  /Resolved (\S+)/i,
  /error: (\S+)/i,
  /failed to resolve (\S+)/i
];
const COMPLETION_MARKERS = ['Resolve completed', 'All packages resolved'];

export function parseResolve(input: string): PackageAnalysis {
  const lines = splitLines(input);
  const issues: PackageIssue[] = [];
  const resolved: string[] = [];
  let failed = false;
  let downloadSeconds = 0;

  for (const line of lines) {
    const trimmed = line.trim();
    const lower = trimmed.toLowerCase();

    if (trimmed.includes('resolved') || trimmed.includes('Resolved')) {
      const name = extractPackageName(trimmed);
      if (name) resolved.push(name);
    }

    if (includesAny(lower, ['error', 'failed', 'cannot resolve'])) {
      failed = true;
      issues.push({ type: 'dependency_error', severity: 'error', message: trimmed });
    }

    if (trimmed.includes('seconds') || trimmed.includes('ms')) {
      downloadSeconds += extractDuration(trimmed);
    }

    if (includesAny(lower, ['network', 'connection', 'timeout'])) {
      issues.push({ type: 'network_error', severity: 'error', message: trimmed });
    }

    if (includesAny(lower, ['conflict', 'incompatible', 'requirement'])) {
      issues.push({ type: 'version_conflict', severity: 'warning', message: trimmed });
    }
  }

  const completed = lines.some((line) => includesAny(line, COMPLETION_MARKERS));
  if (!completed && !issues.some((issue) => issue.type === 'dependency_error')) {
    issues.push({
      type: 'dependency_error',
      severity: 'info',
      message: 'Resolution may not have completed successfully'
    });
  }

  return {
    command: 'resolve',
    success: !failed,
    dependencies: {
      count: resolved.length,
      external: resolved.map((name): ExternalDependency => ({ name, version: 'resolved', type: 'source-control' })),
      local: [],
      circularImports: false,
      versionConflicts: []
    },
    issues,
    metrics: {
      parseTime: 0,
      complexity: 'unknown',
      estimatedIndexTime: downloadSeconds > 0 ? `${downloadSeconds.toFixed(1)}s` : undefined
    }
  };
}

function extractPackageName(line: string): string | undefined {
  for (const pattern of PACKAGE_NAME_PATTERNS) {
    const match = line.match(pattern);
    if (match) return match[1];
  }
  return undefined;
}

// "Downloaded in 2.3 seconds", "took 150ms"
function extractDuration(line: string): number {
  const seconds = line.match(/(\d+(?:\.\d+)?)\s*seconds?/);
  if (seconds) return Number.parseFloat(seconds[1]);
  const millis = line.match(/(\d+)\s*ms/);
  if (millis) return Number.parseInt(millis[1], 10) / 1000;
  return 0;
}
