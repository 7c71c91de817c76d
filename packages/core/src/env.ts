/** Thin helpers around an env object. Callers pass `process.env` or a fixture. */
export function envBool(env: NodeJS.ProcessEnv, name: string, def = false): boolean {
  const v = env[name];
  if (v == null) return def;
  return v === "1" || v.toLowerCase() === "true";
}

export function envNumber(env: NodeJS.ProcessEnv, name: string, def?: number): number | undefined {
  const v = env[name];
  if (v == null || v === "") return def;
  const n = Number(v);
  return Number.isFinite(n) ? n : def;
}

export function envString(env: NodeJS.ProcessEnv, name: string, def?: string): string | undefined {
  const v = env[name];
  return v == null || v === "" ? def : v;
}
