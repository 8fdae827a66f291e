import type { WinRun } from './types';

export function percent(wins: number, runs: number): number {
  return runs > 0 ? Math.round((wins / runs) * 100) : 0;
}

// "3W/12R"
export function formatWinRun(r: WinRun): string {
  return `${r.wins}W/${r.runs}R`;
}

// "1W/3R(33%)"。spaced で "4W/8R (50%)"
export function formatStrikeRate(r: WinRun, spaced = false): string {
  return `${formatWinRun(r)}${spaced ? ' ' : ''}(${percent(r.wins, r.runs)}%)`;
}

export function formatPrice(price?: number): string {
  return typeof price === 'number' && price > 0 ? `$${price.toFixed(2)}` : '-';
}

export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1: return `${n}st`;
    case 2: return `${n}nd`;
    case 3: return `${n}rd`;
    default: return `${n}th`;
  }
}

export function formatRaceHeader(args: {
  track: string;
  raceNumber: number;
  raceName: string;
  distance: number;
  trackCondition?: string;
  trackWet?: boolean;
}): string {
  const parts: string[] = [];
  parts.push(`${args.track} R${args.raceNumber}`);
  const right = [
    `${args.raceName} ${args.distance}m`.trim(),
    args.trackCondition ? `${args.trackCondition}${args.trackWet ? '  *** WET TRACK ***' : ''}` : undefined,
  ].filter(Boolean);
  if (right.length) parts.push(right.join(' | '));
  return `--- ${parts.join(' | ')} ---`;
}

export function truncate(s: string, max: number): string {
  return s.length > max ? s.slice(0, max) : s;
}
