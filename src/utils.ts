import fs from 'fs';
import path from 'path';
import { TextDecoder } from 'util';
import { InputDecodeError } from './errors';
import { OUTPUT_FORMATS, PACKAGE_COMMANDS, SEVERITY_ORDER } from './types';
import type { OutputFormat, PackageCommand, PackageIssue, Severity } from './types';

export function readStream(stream: NodeJS.ReadableStream): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on('data', (d: Buffer | string) => chunks.push(Buffer.from(d)));
    stream.on('error', (err) => reject(err));
    stream.on('end', () => resolve(Buffer.concat(chunks)));
  });
}

export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new InputDecodeError(`Input is not valid UTF-8: ${String(err)}`);
  }
}

export function getToolVersion(): string {
  try {
    const pkgPath = path.join(__dirname, '..', 'package.json');
    const raw = fs.readFileSync(pkgPath, 'utf8');
    const pkg: unknown = JSON.parse(raw);
    return isRecord(pkg) && typeof pkg.version === 'string' ? pkg.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

export function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.indexOf(severity);
}

export function isAtLeast(severity: Severity, minimum: Severity): boolean {
  return severityRank(severity) >= severityRank(minimum);
}

export function filterIssues(issues: PackageIssue[], minSeverity: Severity): PackageIssue[] {
  return issues.filter((issue) => isAtLeast(issue.severity, minSeverity));
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITY_ORDER as readonly string[]).includes(value);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function isPackageCommand(value: unknown): value is PackageCommand {
  return typeof value === 'string' && (PACKAGE_COMMANDS as readonly string[]).includes(value);
}

export function includesAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}

export function splitLines(input: string): string[] {
  return input.split(/\r?\n/);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
