// 馬名・騎手名・調教師名・競馬場名の照合キー。
// あいまい一致はしない（馬具の略号付きなど表記ゆれは単に enrichment されない）。
export function normalizeName(name?: string | null): string {
  return (name ?? '').trim().toUpperCase();
}

export function sameName(a?: string | null, b?: string | null): boolean {
  const ka = normalizeName(a);
  return ka !== '' && ka === normalizeName(b);
}
