const GENERATION_RUN = /(?<!\d)(\d{12})(?!\d)/;

/**
 * Feed artifacts carry their publication time as a 12-digit YYYYMMDDHHMM run,
 * e.g. `PUBLIC_DISPATCH_202511182020_20251118201515_LEGACY.zip` → `202511182020`.
 */
export function extractGenerationId(artifactName: string): string | null {
  const match = GENERATION_RUN.exec(artifactName);
  if (!match) {
    return null;
  }
  const id = match[1];
  const month = Number(id.slice(4, 6));
  const day = Number(id.slice(6, 8));
  const hour = Number(id.slice(8, 10));
  const minute = Number(id.slice(10, 12));
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59) {
    return null;
  }
  return id;
}
