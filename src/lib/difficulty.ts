import type { GradeChange } from './types';

/*
  レース格付けラベル → 難易度スコア（大きいほど難しい）

    Group 1=520, Group 2=510, Group 3=500
    Listed=400
    Class 1=340 … Class 5=300（Class 6 以降も 10 ずつ下がる）
    BM n / 0-n = 100 + n
    Maiden=1

  Class は数字が小さいほど上、BM は数字が大きいほど上。
*/

const BENCHMARK_RE = /\b(?:BENCHMARK|BM)\s*(\d+)/;
const RATING_BAND_RE = /^0\s*[-–]\s*(\d+)$/;
const CLASS_RE = /\bCLASS\s*(\d+)\b/;
const GROUP_RE = /\bGR(?:OUP|P)?\.?\s*([1-3])\b/;

export function difficulty(label?: string | null): number | undefined {
  const s = (label ?? '').trim().toUpperCase();
  if (!s) return undefined;

  if (s.includes('MAIDEN')) return 1;

  const bm = s.match(BENCHMARK_RE) ?? s.match(RATING_BAND_RE);
  if (bm) return 100 + Number(bm[1]);

  const cls = s.match(CLASS_RE);
  if (cls) return 300 + (5 - Number(cls[1])) * 10;

  if (s.includes('LISTED')) return 400;

  const grp = s.match(GROUP_RE);
  if (grp) return 500 + (3 - Number(grp[1])) * 10;

  return undefined;
}

// 片方でもスコア化できなければ方向は出さない（ラベルのみ）
export function gradeChange(current?: string | null, previous?: string | null): GradeChange | undefined {
  const curr = (current ?? '').trim();
  const last = (previous ?? '').trim();
  if (!curr || !last) return undefined;
  if (curr.toUpperCase() === last.toUpperCase()) return { kind: 'unchanged', label: 'same class' };

  const c = difficulty(curr);
  const l = difficulty(last);
  if (c === undefined || l === undefined) {
    return { kind: 'changed', label: `class: ${last} -> ${curr}` };
  }
  if (c < l) return { kind: 'drops', label: `drops in class (${last} -> ${curr})` };
  if (c > l) return { kind: 'rises', label: `rises in class (${last} -> ${curr})` };
  return { kind: 'unchanged', label: 'same class' };
}
