import { describe, expect, it } from 'vitest';
import { parseShowDependencies } from '../src/parsers/showDependencies';

describe('parseShowDependencies', () => {
  it('parses a flat tree', () => {
    const result = parseShowDependencies(['Dependencies:', '├─ SomeDependency (1.2.3)', '└─ AnotherDependency (4.5.6)'].join('\n'));

    expect(result.command).toBe('show-dependencies');
    expect(result.success).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.dependencies).toEqual({
      count: 2,
      external: [
        { name: 'SomeDependency', version: '1.2.3', type: 'registry' },
        { name: 'AnotherDependency', version: '4.5.6', type: 'registry' }
      ],
      local: [],
      circularImports: false,
      versionConflicts: []
    });
  });

  it('parses nested entries', () => {
    const input = [
      'Dependencies:',
      '├─ MainDependency (1.0.0)',
      '│  ├─ SubDependency1 (2.0.0)',
      '│  └─ SubDependency2 (3.0.0)',
      '└─ AnotherMainDep (1.5.0)'
    ].join('\n');

    const result = parseShowDependencies(input);

    expect(result.dependencies?.count).toBe(4);
    expect(result.dependencies?.external.map((dep) => dep.name)).toEqual([
      'MainDependency',
      'SubDependency1',
      'SubDependency2',
      'AnotherMainDep'
    ]);
    expect(result.dependencies?.circularImports).toBe(false);
  });

  it('handles each line format', () => {
    const input = [
      'Dependencies:',
      '├─ ComposableKit@1.23.1',
      '├─ SQLiteData [local]',
      '└─ Foundation (built-in)'
    ].join('\n');

    const result = parseShowDependencies(input);

    expect(result.dependencies?.external).toEqual([
      { name: 'ComposableKit', version: '1.23.1', type: 'registry' },
      { name: 'SQLiteData', version: 'source-control', type: 'source-control', url: 'local' },
      { name: 'Foundation', version: 'built-in', type: 'source-control' }
    ]);
    expect(result.dependencies?.count).toBe(3);
  });

  it('turns error and warning lines into issues with line numbers', () => {
    const input = [
      'Dependencies:',
      'error: Failed to resolve dependency BrokenDep',
      '├─ ValidDep (1.0.0)',
      'warning: Some dependency has version conflicts'
    ].join('\n');

    const result = parseShowDependencies(input);

    expect(result.success).toBe(false);
    expect(result.issues).toEqual([
      {
        type: 'dependency_error',
        severity: 'error',
        message: 'error: Failed to resolve dependency BrokenDep',
        line: 2
      },
      {
        type: 'dependency_error',
        severity: 'warning',
        message: 'warning: Some dependency has version conflicts',
        line: 4
      }
    ]);
    expect(result.dependencies?.external).toEqual([{ name: 'ValidDep', version: '1.0.0', type: 'registry' }]);
  });

  it('skips the package header line', () => {
    const result = parseShowDependencies('Package: WeatherKit\n├─ A (1.0.0)');

    expect(result.dependencies?.external).toEqual([{ name: 'A', version: '1.0.0', type: 'registry' }]);
    expect(result.dependencies?.count).toBe(1);
    expect(result.issues).toEqual([]);
  });

  it('reports failed lines without an error keyword as warnings', () => {
    const result = parseShowDependencies('Dependencies:\n├─ A (1.0.0)\nfetch failed for B');

    expect(result.issues).toEqual([
      { type: 'dependency_error', severity: 'warning', message: 'fetch failed for B', line: 3 }
    ]);
    expect(result.dependencies?.count).toBe(1);
    expect(result.success).toBe(true);
  });

  it('accepts an empty dependency list', () => {
    const result = parseShowDependencies('Dependencies:\nNo dependencies');

    expect(result.success).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.dependencies?.count).toBe(0);
  });

  it('reports multiple versions of the same package', () => {
    const input = ['Dependencies:', '├─ ConflictingDep (1.0.0)', '└─ ConflictingDep (2.0.0)'].join('\n');

    const result = parseShowDependencies(input);

    expect(result.issues).toEqual([
      { type: 'version_conflict', severity: 'warning', message: 'Multiple versions of ConflictingDep: 1.0.0, 2.0.0' },
      { type: 'circular_import', severity: 'error', message: 'Circular dependency detected in package graph' }
    ]);
    expect(result.dependencies?.circularImports).toBe(true);
    expect(result.dependencies?.versionConflicts).toEqual([]);
    expect(result.success).toBe(false);
  });

  it('flags dependencies pinned to a branch', () => {
    const result = parseShowDependencies('Dependencies:\n├─ Networking@main\n└─ Imaging (2.1.0)');

    expect(result.issues).toEqual([
      {
        type: 'version_conflict',
        severity: 'info',
        target: 'Networking',
        message: "Using branch 'main' may cause instability"
      }
    ]);
    expect(result.success).toBe(true);
  });

  it('moves entries without a version to local dependencies', () => {
    const result = parseShowDependencies('Dependencies:\n├─ RemoteDep (1.0.0)\n└─ LocalDep');

    expect(result.dependencies?.external).toEqual([{ name: 'RemoteDep', version: '1.0.0', type: 'registry' }]);
    expect(result.dependencies?.local).toEqual([{ name: 'LocalDep', path: 'LocalDep' }]);
    expect(result.dependencies?.count).toBe(2);
  });

  it('drops entries with an empty version', () => {
    const result = parseShowDependencies('Dependencies:\n├─ Broken@\n└─ Good (1.0.0)');

    expect(result.dependencies?.external).toEqual([{ name: 'Good', version: '1.0.0', type: 'registry' }]);
    expect(result.dependencies?.local).toEqual([]);
    expect(result.dependencies?.count).toBe(1);
  });

  it('treats cycle keywords as a circular dependency', () => {
    const result = parseShowDependencies('Dependencies:\n└─ LoopKit (1.0.0)');

    expect(result.dependencies?.circularImports).toBe(true);
    expect(result.issues).toEqual([
      { type: 'circular_import', severity: 'error', message: 'Circular dependency detected in package graph' }
    ]);
    expect(result.success).toBe(false);
  });

  it('accepts CRLF line endings', () => {
    const result = parseShowDependencies('Dependencies:\r\n├─ A (1.0.0)\r\n└─ B (2.0.0)\r\n');

    expect(result.dependencies?.external.map((dep) => dep.version)).toEqual(['1.0.0', '2.0.0']);
  });
});
