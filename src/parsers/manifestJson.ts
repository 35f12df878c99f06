import { isRecord } from '../utils';

/*
 * Decoding of raw `dump-package` JSON into plain records.
 *
 * Newer manifests wrap optional values in zero- or one-element arrays
 * (`"sourceControl": [{...}]`, `"remote": [{...}]`, `"range": [{...}]`).
 * That convention is unwrapped here and nowhere else.
 */

export type DependencySchema = 'source-control' | 'file-system' | 'registry' | 'legacy';

export interface DependencyEntry {
  schema: DependencySchema;
  name?: string;
  url?: string;
  path?: string;
  version: string;
  /** New-schema wrapper present but its `identity` is missing. */
  missingIdentity: boolean;
  /** Element count of a legacy `requirement.range` string list. */
  rangeLength?: number;
}

export interface TargetDependencyRef {
  product: string;
  package?: string;
}

export interface TargetEntry {
  name: string;
  type: string;
  platforms: string[];
  dependencies: TargetDependencyRef[];
  declaresDependencies: boolean;
  /** `dependencies` is present and an empty list. */
  hasEmptyDependencyList: boolean;
}

export function unwrapOptional(value: unknown): unknown {
  if (Array.isArray(value)) return value.length > 0 ? value[0] : undefined;
  return value;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined;
}

function asStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.every((item) => typeof item === 'string') ? value.map(String) : undefined;
}

export function decodeTargets(manifest: Record<string, unknown>): TargetEntry[] | undefined {
  const raw = manifest.targets;
  if (!Array.isArray(raw)) return undefined;

  const targets: TargetEntry[] = [];
  for (const item of raw) {
    const target = asRecord(item);
    const name = asString(target?.name);
    if (!target || name === undefined) continue;
    const rawDeps = target.dependencies;
    targets.push({
      name,
      type: asString(target.type) ?? 'unknown',
      platforms: decodeTargetPlatforms(target),
      dependencies: decodeTargetDependencies(rawDeps),
      declaresDependencies: rawDeps !== undefined && rawDeps !== null,
      hasEmptyDependencyList: Array.isArray(rawDeps) && rawDeps.length === 0
    });
  }
  return targets;
}

function decodeTargetPlatforms(target: Record<string, unknown>): string[] {
  const settings = target.settings;
  if (!Array.isArray(settings)) return [];
  const platforms: string[] = [];
  for (const setting of settings) {
    const condition = asRecord(asRecord(setting)?.condition);
    const names = asStringList(condition?.platformNames);
    if (names) platforms.push(...names);
  }
  return platforms;
}

// Entries are either plain product names or `{ product: [name, package?, ...] }` / `{ byName: [name, ...] }`.
function decodeTargetDependencies(raw: unknown): TargetDependencyRef[] {
  if (!Array.isArray(raw)) return [];
  const refs: TargetDependencyRef[] = [];
  for (const item of raw) {
    if (typeof item === 'string') {
      refs.push({ product: item });
      continue;
    }
    const dep = asRecord(item);
    if (!dep) continue;
    if (Array.isArray(dep.product) && dep.product.length > 0) {
      const product = asString(dep.product[0]);
      if (product !== undefined) refs.push({ product, package: asString(dep.product[1]) });
    } else if (Array.isArray(dep.byName) && dep.byName.length > 0) {
      const name = asString(dep.byName[0]);
      if (name !== undefined) refs.push({ product: name, package: name });
    }
  }
  return refs;
}

export function decodePackagePlatforms(manifest: Record<string, unknown>): string[] {
  const raw = manifest.platforms;
  const platforms: string[] = [];
  if (Array.isArray(raw)) {
    for (const item of raw) {
      const platform = asRecord(item);
      const name = asString(platform?.platformName);
      const version = asString(platform?.version);
      if (name !== undefined) platforms.push(version !== undefined ? `${name} ${version}` : name);
    }
  } else if (isRecord(raw)) {
    for (const [name, version] of Object.entries(raw)) {
      platforms.push(`${name} ${String(version)}`);
    }
  }
  return platforms.sort();
}

export function decodeDependency(raw: Record<string, unknown>): DependencyEntry {
  const sourceControl = asRecord(unwrapOptional(raw.sourceControl));
  if (sourceControl) {
    const identity = asString(sourceControl.identity);
    if (identity !== undefined) {
      return {
        schema: 'source-control',
        name: identity,
        url: decodeRemoteUrl(sourceControl.location),
        version: decodeBoundedRange(sourceControl.requirement) ?? 'unspecified',
        missingIdentity: false
      };
    }
    return { ...decodeLegacy(raw), missingIdentity: true };
  }

  const fileSystem = asRecord(unwrapOptional(raw.fileSystem));
  if (fileSystem) {
    const identity = asString(fileSystem.identity);
    const path = asString(fileSystem.path);
    return {
      schema: 'file-system',
      name: identity ?? (path !== undefined ? nameFromPath(path) : undefined),
      path,
      version: 'unspecified',
      missingIdentity: identity === undefined
    };
  }

  const registry = asRecord(unwrapOptional(raw.registry));
  if (registry) {
    const identity = asString(registry.identity);
    const exact = asString(unwrapOptional(asRecord(registry.requirement)?.exact));
    return {
      schema: 'registry',
      name: identity,
      version: decodeBoundedRange(registry.requirement) ?? exact ?? 'unspecified',
      missingIdentity: identity === undefined
    };
  }

  return decodeLegacy(raw);
}

function decodeRemoteUrl(location: unknown): string | undefined {
  const remote = asRecord(unwrapOptional(asRecord(location)?.remote));
  return asString(remote?.urlString);
}

function decodeBoundedRange(requirement: unknown): string | undefined {
  const range = asRecord(unwrapOptional(asRecord(requirement)?.range));
  const lower = asString(range?.lowerBound);
  const upper = asString(range?.upperBound);
  if (lower === undefined || upper === undefined) return undefined;
  return `${lower} - ${upper}`;
}

function decodeLegacy(raw: Record<string, unknown>): DependencyEntry {
  const url = asString(raw.url);
  const path = asString(raw.path);
  let name = asString(raw.name);
  if (name === undefined && url !== undefined) name = nameFromUrl(url);
  else if (name === undefined && path !== undefined) name = nameFromPath(path);

  const requirement = asRecord(raw.requirement);
  const range = asStringList(requirement?.range);
  return {
    schema: 'legacy',
    name,
    url,
    path,
    version: legacyVersion(requirement),
    missingIdentity: false,
    rangeLength: range?.length
  };
}

function legacyVersion(requirement: Record<string, unknown> | undefined): string {
  if (!requirement) return 'unspecified';
  const range = asStringList(requirement.range);
  const branch = asString(requirement.branch);
  const revision = asString(requirement.revision);
  const exact = asString(requirement.exact);
  if (range && range.length > 0) return range.join(', ');
  if (branch !== undefined) return `branch: ${branch}`;
  if (revision !== undefined) return `revision: ${revision.slice(0, 7)}`;
  if (exact !== undefined) return exact;
  return 'unspecified';
}

function nameFromUrl(url: string): string {
  const last = url.split('/').pop() || 'unknown';
  return last.replace(/\.git$/, '');
}

function nameFromPath(path: string): string {
  return path.split('/').pop() || 'unknown';
}
