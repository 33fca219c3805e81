/**
 * Bot modes
 *
 * A closed set of runtime contexts, each a single bit. An extension declares
 * the set of modes it may run in as a bitmask; the process runs under one
 * active mask fixed at startup.
 */
export const Mode = {
  PRODUCTION: 1,
  DEVELOPMENT: 2,
  PLUGIN_DEVELOPMENT: 4,
} as const;

export type ModeName = keyof typeof Mode;

export type ModeFlag = (typeof Mode)[ModeName];

/**
 * Any combination of {@link Mode} bits
 */
export type ModeMask = number;

/**
 * Mode names in bit order
 */
export const MODE_NAMES: readonly ModeName[] = ['PRODUCTION', 'DEVELOPMENT', 'PLUGIN_DEVELOPMENT'];

export const ALL_MODES: ModeMask = MODE_NAMES.reduce<ModeMask>((mask, name) => mask | Mode[name], 0);

/**
 * Combine mode flags into a mask
 */
export function combineModes(...modes: ModeFlag[]): ModeMask {
  return modes.reduce<ModeMask>((mask, mode) => mask | mode, 0);
}

/**
 * Whether `mask` has the bit for `mode` set
 */
export function includesMode(mask: ModeMask, mode: ModeFlag): boolean {
  return (mask & mode) !== 0;
}

/**
 * Whether two masks share at least one mode
 */
export function intersects(a: ModeMask, b: ModeMask): boolean {
  return (a & b) !== 0;
}

/**
 * Names of the modes set in `mask`, in bit order
 */
export function modeNames(mask: ModeMask): ModeName[] {
  return MODE_NAMES.filter((name) => includesMode(mask, Mode[name]));
}

/**
 * Check that a value is an integer mask using only known mode bits
 */
export function isModeMask(value: unknown): value is ModeMask {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= 0 &&
    (value & ~ALL_MODES) === 0
  );
}

/**
 * Look up a mode by name
 *
 * Case-insensitive; `-` and `_` are interchangeable, so `plugin-development`
 * resolves to `PLUGIN_DEVELOPMENT`.
 * @returns The mode name, or null if unknown
 */
export function parseModeName(value: string): ModeName | null {
  const normalized = value.trim().toUpperCase().replace(/-/g, '_');
  return MODE_NAMES.find((name) => name === normalized) ?? null;
}

/**
 * Build a mask from mode names
 * @throws Error naming the first unknown mode
 */
export function modesFromNames(names: readonly string[]): ModeMask {
  let mask: ModeMask = 0;
  for (const raw of names) {
    const name = parseModeName(raw);
    if (!name) {
      throw new Error(`Unknown bot mode "${raw}". Expected one of: ${MODE_NAMES.join(', ')}`);
    }
    mask |= Mode[name];
  }
  return mask;
}
