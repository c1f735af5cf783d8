// src/cli/argv.ts

/**
 * Single-dash long flags (`-query`, `-full_desc`) and the option each one
 * maps to. Unique prefixes are accepted as abbreviations (`-q`, `-ful`).
 */
const LEGACY_FLAGS: Record<string, string> = {
  query: '--query',
  list: '--list',
  desc: '--desc',
  full_desc: '--full-desc',
  'full-desc': '--full-desc',
  whitespaces: '--whitespaces',
  help: '--help',
  man: '--man',
};

export function resolveLegacyFlag(name: string): string | null {
  const lowered = name.toLowerCase();
  if (LEGACY_FLAGS[lowered]) {
    return LEGACY_FLAGS[lowered];
  }

  const targets = new Set(
    Object.keys(LEGACY_FLAGS)
      .filter((flag) => flag.startsWith(lowered))
      .map((flag) => LEGACY_FLAGS[flag])
  );
  return targets.size === 1 ? [...targets][0] : null;
}

/** Rewrites `-query x`, `-full_desc`, `-d=40` and friends into commander's `--long` form */
export function normalizeArgv(argv: string[]): string[] {
  const [node, script, ...rest] = argv;
  const normalized: string[] = [];
  let passthrough = false;

  for (const token of rest) {
    const match = /^--?([A-Za-z][A-Za-z_-]*)(=.*)?$/.exec(token);
    if (passthrough || token === '--' || !match) {
      passthrough = passthrough || token === '--';
      normalized.push(token);
      continue;
    }

    const flag = resolveLegacyFlag(match[1]);
    normalized.push(flag ? flag + (match[2] ?? '') : token);
  }

  return [node, script, ...normalized];
}

export function isBareInteger(token: string): boolean {
  return /^[+-]?\d+$/.test(token);
}
