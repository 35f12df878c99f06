import type { PackageCommand } from './types';
import { includesAny, splitLines } from './utils';

const TREE_MARKERS = ['├─', '└─', '│'];
const RESOLVE_WORDS = ['resolving', 'fetching', 'resolved', 'updating'];
const DESCRIBE_WORDS = ['package name:', 'package version:'];
const UPDATE_WORDS = ['updating', 'updated', 'checking out'];
const ERROR_WORDS = ['error:', 'failed', 'cannot', 'unable to', 'invalid'];

// Keyword sniffing; order matters since "updating" also marks resolve output.
export function detectCommandType(output: string): PackageCommand {
  const text = output.toLowerCase();
  if (text.includes('"name"') && text.includes('"targets"')) return 'dump-package';
  if (includesAny(text, TREE_MARKERS)) return 'show-dependencies';
  if (includesAny(text, RESOLVE_WORDS)) return 'resolve';
  if (includesAny(text, DESCRIBE_WORDS)) return 'describe';
  if (includesAny(text, UPDATE_WORDS)) return 'update';
  return 'unknown';
}

export function hasErrorOutput(output: string): boolean {
  return includesAny(output.toLowerCase(), ERROR_WORDS);
}

export function extractErrorMessages(output: string): string[] {
  return splitLines(output)
    .map((line) => line.trim())
    .filter((line) => {
      const lower = line.toLowerCase();
      return lower.includes('error:') || lower.startsWith('error');
    });
}
