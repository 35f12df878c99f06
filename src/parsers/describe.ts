import type { PackageAnalysis, PackageIssue } from '../types';
import { splitLines } from '../utils';

export function parseDescribe(input: string): PackageAnalysis {
  const issues: PackageIssue[] = [];
  let packageName: string | undefined;

  for (const line of splitLines(input)) {
    const trimmed = line.trim();
    const lower = trimmed.toLowerCase();
    if (lower.startsWith('package name:')) {
      packageName = trimmed.slice('package name:'.length).trim();
    }
    if (lower.includes('error')) {
      issues.push({ type: 'syntax_error', severity: 'error', message: trimmed });
    }
  }

  return {
    command: 'describe',
    success: packageName !== undefined,
    issues
  };
}
