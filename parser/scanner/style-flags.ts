/**
 * Style state for inline runs: a bit-set of independent attributes plus the
 * SGR start/end codes needed to move the terminal from one state to another.
 */

/**
 * Style attributes. Values combine with `|`; `None` is both the initial state
 * of every paragraph and the state the renderer always returns to.
 */
export enum StyleFlags {
  None = 0,
  Bold = 1 << 0,
  Italic = 1 << 1,
  Strikethrough = 1 << 2,

  All = Bold | Italic | Strikethrough,
}

interface StyleCodes {
  flag: StyleFlags;
  name: string;
  start: string;
  end: string;
}

/** Canonical attribute order: codes are always emitted bold, italic, strikethrough. */
const styleCodeTable: readonly StyleCodes[] = [
  { flag: StyleFlags.Bold, name: 'Bold', start: '\x1b[1m', end: '\x1b[22m' },
  { flag: StyleFlags.Italic, name: 'Italic', start: '\x1b[3m', end: '\x1b[23m' },
  { flag: StyleFlags.Strikethrough, name: 'Strikethrough', start: '\x1b[9m', end: '\x1b[29m' },
];

/** Flip exactly one attribute, returning the new style. */
export function toggleStyle(style: StyleFlags, flag: StyleFlags): StyleFlags {
  return (style ^ flag) & StyleFlags.All;
}

export function hasStyle(style: StyleFlags, flag: StyleFlags): boolean {
  return (style & flag) === flag;
}

/** Attributes set in `style` but not in `without`. */
export function styleDifference(style: StyleFlags, without: StyleFlags): StyleFlags {
  return style & ~without & StyleFlags.All;
}

export function startCodes(style: StyleFlags): string {
  let codes = '';
  for (const entry of styleCodeTable) {
    if (style & entry.flag) codes += entry.start;
  }
  return codes;
}

export function endCodes(style: StyleFlags): string {
  let codes = '';
  for (const entry of styleCodeTable) {
    if (style & entry.flag) codes += entry.end;
  }
  return codes;
}

/**
 * Codes that move the terminal from `previous` to `current`: end codes for
 * discontinued attributes first, then start codes for new ones.
 * Attributes present in both states emit nothing.
 */
export function transitionCodes(previous: StyleFlags, current: StyleFlags): string {
  if (previous === current) return '';
  return endCodes(styleDifference(previous, current)) +
    startCodes(styleDifference(current, previous));
}

/** Readable form such as `Bold|Italic`, or `None`. */
export function describeStyle(style: StyleFlags): string {
  const names: string[] = [];
  for (const entry of styleCodeTable) {
    if (style & entry.flag) names.push(entry.name);
  }
  return names.length ? names.join('|') : 'None';
}
