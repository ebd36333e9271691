import { z } from 'zod';

const NS = 'SPAN_TREE';

export type Env = Record<string, string | undefined>;

const numberSchema = z.coerce.number().finite();
const booleanSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['1', 'true', 'yes', 'on', '0', 'false', 'no', 'off']));

function resolveKey(name: string): string {
  // Accept "indent", "INDENT" or the full "SPAN_TREE_INDENT"
  const upper = name.toUpperCase();
  return upper.startsWith(NS + '_') ? upper : `${NS}_${upper}`;
}

export function getConfig(name: string, env: Env = process.env): string | undefined {
  const raw = env[resolveKey(name)];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Retrieve a numeric setting from the environment, applying defaults and clamping.
 *
 * @param name setting name, with or without the SPAN_TREE_ prefix
 * @param def default value if the setting is absent or invalid
 * @param min minimum inclusive value
 * @param max maximum inclusive value
 */
export function getNumberConfig(name: string, def: number, min: number, max: number, env: Env = process.env): number {
  const raw = getConfig(name, env);
  const parsed = raw === undefined ? undefined : numberSchema.safeParse(raw);
  const n = parsed?.success ? Math.floor(parsed.data) : def;
  return Math.max(min, Math.min(max, n));
}

export function getBooleanConfig(name: string, def: boolean, env: Env = process.env): boolean {
  const raw = getConfig(name, env);
  if (raw === undefined) return def;
  const parsed = booleanSchema.safeParse(raw);
  if (!parsed.success) return def;
  return ['1', 'true', 'yes', 'on'].includes(parsed.data);
}

export type CliConfig = {
  indentWidth: number;
  trace: boolean;
};

export function loadCliConfig(env: Env = process.env): CliConfig {
  return {
    indentWidth: getNumberConfig('indent', 2, 0, 8, env),
    trace: getBooleanConfig('trace', false, env)
  };
}
