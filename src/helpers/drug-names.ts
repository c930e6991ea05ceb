/** Counter-ion and hydrate suffixes stripped from salt forms; first match wins. */
export const SALT_SUFFIXES = [
  "hydrochloride",
  "hydrobromide",
  "sulfate",
  "succinate",
  "chloride",
  "dimesylate",
  "tartrate",
  "citrate",
  "tosylate",
  "mesylate",
  "saccharate",
  "hemihydrate",
  "maleate",
  "phosphate",
  "malate",
  "esylate",
  "anhydrous",
] as const;

/**
 * Lowercases a drug name and drops one trailing salt suffix, so that
 * "Bupropion Hydrochloride" and "bupropion" compare equal.
 */
export function normalizeDrugName(name: string): string {
  const lower = name.toLowerCase();
  for (const suffix of SALT_SUFFIXES) {
    if (lower.endsWith(` ${suffix}`)) {
      return lower.slice(0, -(suffix.length + 1)).trim();
    }
  }
  return lower;
}
