import type { ExternalDependency, PackageAnalysis, PackageIssue } from '../types';
import { includesAny, splitLines } from '../utils';

export function parseUpdate(input: string): PackageAnalysis {
  const issues: PackageIssue[] = [];
  const updated: string[] = [];
  let failed = false;

  for (const line of splitLines(input)) {
    const trimmed = line.trim();
    const lower = trimmed.toLowerCase();

    if (lower.includes('updated') || lower.includes('updating')) {
      const name = extractPackageName(trimmed);
      if (name) updated.push(name);
    }

    if (includesAny(lower, ['error', 'failed', 'cannot update'])) {
      failed = true;
      issues.push({ type: 'dependency_error', severity: 'error', message: trimmed });
    }

    if (includesAny(lower, ['network', 'connection'])) {
      issues.push({ type: 'network_error', severity: 'error', message: trimmed });
    }
  }

  return {
    command: 'update',
    success: !failed,
    dependencies: {
      count: updated.length,
      external: updated.map((name): ExternalDependency => ({ name, version: 'updated', type: 'source-control' })),
      local: [],
      circularImports: false,
      versionConflicts: []
    },
    issues
  };
}

// First word that is not the status verb itself.
function extractPackageName(line: string): string | undefined {
  return line.split(' ').find((word) => {
    const lower = word.toLowerCase();
    return word !== '' && !lower.includes('updated') && !lower.includes('updating') && !lower.includes('error');
  });
}
