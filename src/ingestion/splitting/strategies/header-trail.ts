import { HEADER_KEYS, HeaderTrail } from '../../types/chunk.types';

export type HeadingLevel = 1 | 2 | 3;

export function toHeadingLevel(level: number): HeadingLevel | null {
  return level === 1 || level === 2 || level === 3 ? level : null;
}

/**
 * Trail after entering a heading: outer levels are kept, the heading's own
 * level is replaced and anything deeper is dropped.
 */
export function enterHeading(
  trail: HeaderTrail,
  level: HeadingLevel,
  title: string,
): HeaderTrail {
  const next: HeaderTrail = {};

  for (const key of HEADER_KEYS.slice(0, level - 1)) {
    const outer = trail[key];
    if (outer !== undefined) {
      next[key] = outer;
    }
  }
  next[HEADER_KEYS[level - 1]] = title;

  return next;
}
