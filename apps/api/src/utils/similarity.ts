import levenshtein from 'fast-levenshtein';

// No id/key suffix stripping: `patient_id` and `patient` must not score as the same name.
export const normalizeName = (name: string) =>
  name
    .toLowerCase()
    .replace(/[_\s-]/g, '')
    .trim();

export const nameSimilarity = (a: string, b: string) => {
  const na = normalizeName(a);
  const nb = normalizeName(b);
  if (!na || !nb) return 0;
  const dist = levenshtein.get(na, nb);
  const maxLen = Math.max(na.length, nb.length) || 1;
  return 1 - dist / maxLen;
};
