/**
 * Build tool verbosity levels, accepted in full or abbreviated form
 * (q, m, n, d, diag, or any longer prefix of the full name).
 */
export const VERBOSITY_LEVELS = [
  { name: "quiet", abbreviation: "q" },
  { name: "minimal", abbreviation: "m" },
  { name: "normal", abbreviation: "n" },
  { name: "detailed", abbreviation: "d" },
  { name: "diagnostic", abbreviation: "diag" },
] as const;

export type Verbosity = (typeof VERBOSITY_LEVELS)[number]["name"];

export const DEFAULT_VERBOSITY: Verbosity = "minimal";

/**
 * Normalizes a verbosity option to its full name.
 * @throws Error if the value matches no level
 */
export function parseVerbosity(value: string): Verbosity {
  const normalized = value.trim().toLowerCase();
  const level = VERBOSITY_LEVELS.find(
    (candidate) => candidate.name.startsWith(normalized) && normalized.startsWith(candidate.abbreviation)
  );

  if (!level) {
    const accepted = VERBOSITY_LEVELS.map((l) => `${l.name} (${l.abbreviation})`).join(", ");
    throw new Error(`Invalid verbosity "${value}". Accepted values: ${accepted}`);
  }
  return level.name;
}
