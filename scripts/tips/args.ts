import { isIsoDate, todayIso } from '../../src/lib/date';

export type TipsArgs = {
  date: string;
  jurisdiction: string;
  allTracks: boolean;
  batchSize?: number; // 未指定なら BATCH_SIZE
  noAi: boolean;
  outDir?: string;
};

export const USAGE =
  'Usage: build-tips.ts [--date YYYY-MM-DD] [--state NSW] [--all-tracks] [--batch-size N] [--no-ai] [--out DIR]';

export class UsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${USAGE}`);
    this.name = 'UsageError';
  }
}

export function parseArgs(argv: readonly string[], now: Date = new Date()): TipsArgs {
  const args: TipsArgs = { date: todayIso(now), jurisdiction: 'NSW', allTracks: false, noAi: false };
  const value = (i: number, flag: string): string => {
    const v = argv[i + 1];
    if (v === undefined || v.startsWith('--')) throw new UsageError(`${flag} needs a value`);
    return v;
  };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--date') {
      const d = value(i++, a);
      if (!isIsoDate(d)) throw new UsageError(`invalid date: ${d}`);
      args.date = d;
    } else if (a === '--state') {
      args.jurisdiction = value(i++, a).toUpperCase();
    } else if (a === '--all-tracks') {
      args.allTracks = true;
    } else if (a === '--batch-size') {
      const n = Number(value(i++, a));
      if (!Number.isInteger(n) || n < 1) throw new UsageError(`invalid batch size: ${argv[i]}`);
      args.batchSize = n;
    } else if (a === '--no-ai') {
      args.noAi = true;
    } else if (a === '--out') {
      args.outDir = value(i++, a);
    } else {
      throw new UsageError(`unknown argument: ${a}`);
    }
  }
  return args;
}
