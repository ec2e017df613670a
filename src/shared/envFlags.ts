const ENABLED_VALUES = new Set(["1", "true", "yes", "on"]);
const DISABLED_VALUES = new Set(["0", "false", "no", "off"]);

/** Reads an on/off environment flag; unset or unrecognised values yield `fallback`. */
export function resolveBooleanFlag(raw: string | undefined, fallback = false): boolean {
  if (typeof raw !== "string") {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  if (ENABLED_VALUES.has(value)) {
    return true;
  }
  if (DISABLED_VALUES.has(value)) {
    return false;
  }
  return fallback;
}
