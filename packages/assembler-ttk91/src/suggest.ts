// 隣接文字の入れ替えを 1 手と数える編集距離。
export function editDistance(left: string, right: string): number {
  const rows = left.length + 1;
  const cols = right.length + 1;
  const table: number[][] = [];
  for (let i = 0; i < rows; i += 1) {
    const row: number[] = [];
    for (let j = 0; j < cols; j += 1) {
      row.push(i === 0 ? j : j === 0 ? i : 0);
    }
    table.push(row);
  }

  const at = (i: number, j: number): number => table[i]?.[j] ?? 0;

  for (let i = 1; i < rows; i += 1) {
    for (let j = 1; j < cols; j += 1) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      let best = Math.min(at(i - 1, j) + 1, at(i, j - 1) + 1, at(i - 1, j - 1) + cost);
      if (i > 1 && j > 1 && left[i - 1] === right[j - 2] && left[i - 2] === right[j - 1]) {
        best = Math.min(best, at(i - 2, j - 2) + 1);
      }
      const row = table[i];
      if (row) {
        row[j] = best;
      }
    }
  }

  return at(rows - 1, cols - 1);
}

export function closestMatch(word: string, candidates: Iterable<string>, maxDistance = 2): string | undefined {
  const needle = word.toUpperCase();
  let best: string | undefined;
  let bestDistance = maxDistance + 1;
  for (const candidate of candidates) {
    const distance = editDistance(needle, candidate.toUpperCase());
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}
