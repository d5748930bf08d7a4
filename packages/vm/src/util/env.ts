// Environment parsing shared by the config layer.

export function flag(value: string | undefined): boolean {
  const v = (value || '').toLowerCase();
  return v === '1' || v === 'true';
}

/** Parses an integer variable; undefined when unset so defaults apply, NaN when malformed. */
export function envInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isInteger(value) ? value : Number.NaN;
}
