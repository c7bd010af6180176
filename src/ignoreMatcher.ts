import { Minimatch } from 'minimatch';
import fs from 'fs';
import path from 'path';

export interface IgnoreRule {
  pattern: string;
  negated: boolean;
  anchored: boolean;
  directoryOnly: boolean;
  matcher: Minimatch;
}

export type IgnoreRuleSet = readonly IgnoreRule[];

// gitignore has neither extglobs nor braces, and '#'/'!' are handled here.
const GLOB_OPTIONS = { dot: true, nocomment: true, nonegate: true, noext: true, nobrace: true };

function compileRule(line: string): IgnoreRule | undefined {
  let pattern = line.replace(/\r$/, '').replace(/(?<!\\) +$/, '');
  if (!pattern || pattern.startsWith('#')) return;

  let negated = false;
  if (pattern.startsWith('!')) {
    negated = true;
    pattern = pattern.slice(1);
  } else if (pattern.startsWith('\\#') || pattern.startsWith('\\!')) {
    pattern = pattern.slice(1);
  }

  // a dangling escape means a literal backslash
  const trailingEscapes = /\\*$/.exec(pattern)?.[0].length ?? 0;
  if (trailingEscapes % 2 === 1) pattern += '\\';

  let directoryOnly = false;
  if (pattern.endsWith('/')) {
    directoryOnly = true;
    pattern = pattern.replace(/\/+$/, '');
  }

  let anchored = pattern.includes('/');
  if (pattern.startsWith('/')) {
    anchored = true;
    pattern = pattern.replace(/^\/+/, '');
  }
  if (!pattern) return;

  return {
    pattern,
    negated,
    anchored,
    directoryOnly,
    matcher: new Minimatch(anchored ? pattern : `**/${pattern}`, GLOB_OPTIONS)
  };
}

export function compileIgnoreRules(patternLines: readonly string[]): IgnoreRuleSet {
  const rules: IgnoreRule[] = [];
  for (const line of patternLines) {
    const rule = compileRule(line);
    if (rule) rules.push(rule);
  }
  return rules;
}

/** Last matching rule wins; undefined when nothing matches. */
function lastMatch(ruleSet: IgnoreRuleSet, target: string, isDirectory: boolean): boolean | undefined {
  let outcome: boolean | undefined;
  for (const rule of ruleSet) {
    if (rule.directoryOnly && !isDirectory) continue;
    if (rule.matcher.match(target)) outcome = !rule.negated;
  }
  return outcome;
}

/**
 * Decides whether `relativePath` (relative to the repository root, '/'-separated,
 * trailing '/' for directories) is excluded.
 *
 * Ancestors are checked first: once a directory is excluded nothing beneath it
 * can be re-included, whatever the order of the rules.
 */
export function isIgnored(ruleSet: IgnoreRuleSet, relativePath: string): boolean {
  if (!ruleSet.length) return false;
  const isDirectory = relativePath.endsWith('/');
  const segments = relativePath.split('/').filter((s) => s && s !== '.');
  if (!segments.length) return false;

  for (let depth = 1; depth < segments.length; depth++) {
    if (lastMatch(ruleSet, segments.slice(0, depth).join('/'), true)) return true;
  }
  return lastMatch(ruleSet, segments.join('/'), isDirectory) ?? false;
}

export function loadIgnoreFile(repoDir: string, fileName: string): string[] {
  const p = path.join(repoDir, fileName);
  return fs.existsSync(p) ? fs.readFileSync(p, 'utf-8').split(/\r?\n/) : [];
}
