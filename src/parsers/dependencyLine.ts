import type { DependencyType, ExternalDependency } from '../types';

export const TREE_GLYPHS: readonly string[] = ['├', '│', '└', '─', ' '];

const LEADING_TREE_GLYPHS = /^[├│└─ ]+/;
const PAREN_VERSION = /^(.*) \(([^)]+)\)$/;
const BRACKET_VALUE = /^(.*) \[([^\]]+)\]$/;
const ANGLE_SPAN = /<[^>]+>/;
const REGISTRY_VERSION_PREFIX = /^[123]\./;

export function isTreeGlyph(char: string | undefined): boolean {
  return char !== undefined && TREE_GLYPHS.includes(char);
}

/**
 * Parses one line of `show-dependencies` tree output.
 *
 * Patterns are tried in a fixed order and the first match wins:
 * `name (version)`, `name@version`, `name [url]`, `name<url@version>`, bare `name`.
 * Returns undefined when nothing but tree glyphs and whitespace remain.
 */
export function parseDependencyLine(line: string): ExternalDependency | undefined {
  const trimmed = line.replace(LEADING_TREE_GLYPHS, '').trim();
  if (!trimmed) return undefined;

  const paren = trimmed.match(PAREN_VERSION);
  if (paren) {
    const version = paren[2];
    return { name: paren[1].trim(), version, type: classifyVersion(version) };
  }

  const atIndex = trimmed.indexOf('@');
  // An '@' inside a `<url@version>` span belongs to the angle-bracket form.
  if (atIndex !== -1 && !trimmed.slice(0, atIndex).includes('<')) {
    const version = trimmed.slice(atIndex + 1).trim();
    return { name: trimmed.slice(0, atIndex).trim(), version, type: classifyVersion(version) };
  }

  const bracket = trimmed.match(BRACKET_VALUE);
  if (bracket) {
    return { name: bracket[1].trim(), version: 'source-control', type: 'source-control', url: bracket[2] };
  }

  const angle = ANGLE_SPAN.exec(trimmed);
  if (angle) {
    const payload = angle[0].slice(1, -1);
    const split = payload.indexOf('@');
    const url = split === -1 ? payload : payload.slice(0, split);
    const version = split === -1 ? 'unspecified' : payload.slice(split + 1);
    return { name: trimmed.slice(0, angle.index).trim(), version, type: 'source-control', url };
  }

  return { name: trimmed, version: 'unspecified', type: 'source-control' };
}

export function classifyVersion(version: string): DependencyType {
  if (version.includes('registry') || REGISTRY_VERSION_PREFIX.test(version)) return 'registry';
  if (version.includes('.binary') || version.toLowerCase().includes('xcframework')) return 'binary';
  return 'source-control';
}
