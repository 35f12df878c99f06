import { describe, expect, it } from 'vitest';
import { analyzeOutput, determineComplexity, estimateIndexTime, parseInput } from '../src/analyzer';
import { emptyDependencyAnalysis } from '../src/types';
import type { PackageAnalysis, PackageIssue } from '../src/types';

const tree = ['Dependencies:', '├─ Networking@main', '└─ Imaging (2.1.0)'].join('\n');

function sized(targets: number, dependencies: number, issues: number): PackageAnalysis {
  return {
    command: 'dump-package',
    success: true,
    targets: { count: targets, hasTestTargets: false, platforms: [], executables: [], libraries: [] },
    dependencies: { ...emptyDependencyAnalysis(), count: dependencies },
    issues: Array.from({ length: issues }, (): PackageIssue => ({ type: 'unknown', severity: 'info', message: 'note' }))
  };
}

describe('parseInput', () => {
  it('dispatches on the detected command', () => {
    const result = parseInput(tree);

    expect(result.command).toBe('show-dependencies');
    expect(result.dependencies?.count).toBe(2);
  });

  it('honors an explicit command', () => {
    const result = parseInput('{"name": "Solo", "products": []}', { command: 'dump-package' });

    expect(result.command).toBe('dump-package');
    expect(result.issues).toEqual([
      { type: 'missing_target', severity: 'warning', message: 'No targets found in package' }
    ]);
  });

  it('passes the target filter to the manifest parser', () => {
    const input = JSON.stringify({
      name: 'Filtered',
      products: [],
      targets: [
        { name: 'Core', type: 'library', dependencies: ['Models'] },
        { name: 'App', type: 'executable', dependencies: ['Core'] }
      ]
    });

    const result = parseInput(input, { target: 'App' });

    expect(result.targets?.count).toBe(1);
    expect(result.targets?.filteredTarget).toBe('App');
  });

  it('short-circuits on error output', () => {
    const result = parseInput('error: Invalid package manifest\nwarning: Deprecated syntax');

    expect(result).toEqual({
      command: 'unknown',
      success: false,
      issues: [{ type: 'unknown', severity: 'error', message: 'error: Invalid package manifest' }]
    });
  });

  it('reports unrecognized output', () => {
    expect(parseInput('hello world')).toEqual({
      command: 'unknown',
      success: false,
      issues: [{ type: 'unknown', severity: 'warning', message: 'Unknown command output format' }]
    });
  });
});

describe('analyzeOutput', () => {
  it('omits metrics and raw output by default', () => {
    const result = analyzeOutput(tree);

    expect(result.metrics).toBeUndefined();
    expect(result.rawOutput).toBeUndefined();
    expect(result.issues).toHaveLength(1);
  });

  it('attaches metrics on request', () => {
    const result = analyzeOutput(tree, { metrics: true });

    expect(result.metrics?.complexity).toBe('low');
    expect(result.metrics?.estimatedIndexTime).toBe('5-15s');
    expect(result.metrics?.parseTime).toBeGreaterThanOrEqual(0);
  });

  it('filters issues below the minimum severity', () => {
    expect(analyzeOutput(tree, { minSeverity: 'info' }).issues).toHaveLength(1);
    expect(analyzeOutput(tree, { minSeverity: 'warning' }).issues).toEqual([]);
  });

  it('includes the raw input when verbose', () => {
    expect(analyzeOutput(tree, { verbose: true }).rawOutput).toBe(tree);
  });
});

describe('determineComplexity', () => {
  it('classifies small packages as low', () => {
    expect(determineComplexity(sized(10, 5, 2))).toBe('low');
  });

  it('requires every measure in range for medium', () => {
    expect(determineComplexity(sized(12, 8, 4))).toBe('medium');
    expect(determineComplexity(sized(12, 2, 0))).toBe('high');
  });

  it('classifies large packages as high', () => {
    expect(determineComplexity(sized(40, 20, 12))).toBe('high');
  });
});

describe('estimateIndexTime', () => {
  it('weights dependencies twice as heavily as targets', () => {
    expect(estimateIndexTime(sized(19, 0, 0))).toBe('5-15s');
    expect(estimateIndexTime(sized(10, 5, 0))).toBe('15-45s');
    expect(estimateIndexTime(sized(0, 25, 0))).toBe('45-90s');
    expect(estimateIndexTime(sized(0, 50, 0))).toBe('90s+');
  });
});
