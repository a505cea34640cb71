/**
 * Case-name filter: a glob when the pattern uses `*` or `?`, otherwise a
 * case-sensitive substring
 */

import { hasGlobSyntax, matchesGlob, unescapeGlob } from '../matcher/index.js';

export type NameFilter = (name: string) => boolean;

export function createNameFilter(pattern: string | undefined): NameFilter {
  if (pattern === undefined || pattern === '') {
    return () => true;
  }
  if (hasGlobSyntax(pattern)) {
    return (name) => matchesGlob(pattern, name);
  }
  const text = unescapeGlob(pattern);
  return (name) => name.includes(text);
}
