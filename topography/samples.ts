/**
 * Sample file names look like `<f0>_<f1>_<f2>_<f3>_<L|R>_<NNN>[_extra]*.csv`.
 * Fields 0–3 are the base key, field 4 the eye, and the digits of field 5 the
 * acquisition sequence.
 */
export type SampleName = {
  fileName: string;
  baseKey: string;
  eye: string;
  sequence: number;
};

export function parseSampleName(fileName: string): SampleName | null {
  const parts = fileName.split("_");
  if (parts.length < 6) return null;
  const digits = parts[5].replace(/\D/g, "");
  if (digits.length === 0) return null;
  return {
    fileName,
    baseKey: parts.slice(0, 4).join("_"),
    eye: parts[4],
    sequence: Number.parseInt(digits, 10),
  };
}

export type DuplicateRemoval = {
  keep: SampleName;
  remove: SampleName;
  reason: string;
};

export function removalReason(keep: SampleName, remove: SampleName): string {
  return `Keep sequence ${keep.sequence} (lower) vs ${remove.sequence} (higher) for eye ${keep.eye}`;
}

/**
 * Groups names by patient–eye and keeps the lowest sequence of each group.
 * Groups come out in first-seen order of `fileNames`, members in ascending
 * sequence; equal sequences keep their listing order.
 */
export function planDeduplication(fileNames: readonly string[]): DuplicateRemoval[] {
  const groups = new Map<string, SampleName[]>();
  for (const name of fileNames) {
    const parsed = parseSampleName(name);
    if (!parsed) continue;
    const key = `${parsed.baseKey}\u0000${parsed.eye}`;
    const group = groups.get(key);
    if (group) group.push(parsed);
    else groups.set(key, [parsed]);
  }

  const removals: DuplicateRemoval[] = [];
  for (const members of groups.values()) {
    if (members.length < 2) continue;
    const sorted = [...members].sort((a, b) => a.sequence - b.sequence);
    const [keep, ...rest] = sorted;
    for (const remove of rest) removals.push({ keep, remove, reason: removalReason(keep, remove) });
  }
  return removals;
}
