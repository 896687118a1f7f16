export function readEnv(name: string): string | null {
  const value = process.env[name];
  if (!value) return null;
  return value.trim();
}

export function readEnvRaw(name: string): string | undefined {
  return process.env[name];
}

const TRUTHY = new Set(["1", "true", "yes", "y", "on"]);
const FALSY = new Set(["0", "false", "no", "n", "off"]);

/** `null` when unset or unrecognised, so callers can fall through to the next source. */
export function readBooleanEnv(name: string): boolean | null {
  const raw = readEnvRaw(name);
  if (raw == null) return null;
  const normalized = raw.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return null;
}

export function readListEnv(name: string): string[] | null {
  const raw = readEnv(name);
  if (!raw) return null;
  return raw
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean);
}
