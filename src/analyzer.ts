import { detectCommandType, extractErrorMessages, hasErrorOutput } from './commandDetector';
import { parseDescribe } from './parsers/describe';
import { parseDumpPackage } from './parsers/dumpPackage';
import { parseResolve } from './parsers/resolve';
import { parseShowDependencies } from './parsers/showDependencies';
import { parseUpdate } from './parsers/update';
import type {
  AnalyzeOptions,
  ComplexityLevel,
  PackageAnalysis,
  PackageCommand,
  PackageIssue,
  PackageMetrics
} from './types';
import { filterIssues } from './utils';

export function parseAs(command: PackageCommand, input: string, target?: string): PackageAnalysis {
  switch (command) {
    case 'dump-package':
      return parseDumpPackage(input, target);
    case 'show-dependencies':
      return parseShowDependencies(input);
    case 'resolve':
      return parseResolve(input);
    case 'describe':
      return parseDescribe(input);
    case 'update':
      return parseUpdate(input);
    case 'unknown':
      return {
        command: 'unknown',
        success: false,
        issues: [{ type: 'unknown', severity: 'warning', message: 'Unknown command output format' }]
      };
  }
}

/**
 * Error output short-circuits to an issue-only result before any structural parser runs.
 */
export function parseInput(input: string, options: Pick<AnalyzeOptions, 'command' | 'target'> = {}): PackageAnalysis {
  const command = options.command ?? detectCommandType(input);
  if (hasErrorOutput(input)) {
    return {
      command,
      success: false,
      issues: extractErrorMessages(input).map((message): PackageIssue => ({ type: 'unknown', severity: 'error', message }))
    };
  }
  return parseAs(command, input, options.target);
}

export function analyzeOutput(input: string, options: AnalyzeOptions = {}): PackageAnalysis {
  const startTime = Date.now();
  const parsed = parseInput(input, options);
  const parseTime = (Date.now() - startTime) / 1000;

  const result: PackageAnalysis = { ...parsed };
  if (options.metrics) {
    result.metrics = buildMetrics(parsed, parseTime);
  }
  if (options.minSeverity) {
    result.issues = filterIssues(parsed.issues, options.minSeverity);
  }
  if (options.verbose) {
    result.rawOutput = input;
  }
  return result;
}

export function buildMetrics(result: PackageAnalysis, parseTime: number): PackageMetrics {
  return {
    parseTime,
    complexity: determineComplexity(result),
    estimatedIndexTime: estimateIndexTime(result)
  };
}

function within(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

export function determineComplexity(result: PackageAnalysis): ComplexityLevel {
  const targets = result.targets?.count ?? 0;
  const dependencies = result.dependencies?.count ?? 0;
  const issues = result.issues.length;

  if (within(targets, 0, 10) && within(dependencies, 0, 5) && within(issues, 0, 2)) return 'low';
  if (within(targets, 11, 30) && within(dependencies, 6, 15) && within(issues, 3, 10)) return 'medium';
  return 'high';
}

export function estimateIndexTime(result: PackageAnalysis): string {
  const weight = (result.targets?.count ?? 0) + (result.dependencies?.count ?? 0) * 2;
  if (weight < 20) return '5-15s';
  if (weight < 50) return '15-45s';
  if (weight < 100) return '45-90s';
  return '90s+';
}
