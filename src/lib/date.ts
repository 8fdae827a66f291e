import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';

dayjs.extend(utc);
dayjs.extend(timezone);

// 開催日は豪州東部時間で数える
export const RACE_TZ = 'Australia/Sydney';

export function todayIso(now: Date = new Date()): string {
  return dayjs(now).tz(RACE_TZ).format('YYYY-MM-DD');
}

// dayjs は 2024-02-31 を 3/2 に繰り上げるので、書き戻して一致を見る
export function isIsoDate(s: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(s)) return false;
  const d = dayjs.tz(s, 'YYYY-MM-DD', RACE_TZ);
  return d.isValid() && d.format('YYYY-MM-DD') === s;
}

// raceDate（YYYY-MM-DD）と前走の開始時刻（ISO）の暦日差。解釈できなければ undefined
export function daysBetween(raceDate: string, startTime?: string | null): number | undefined {
  if (!startTime || !isIsoDate(raceDate)) return undefined;
  const last = dayjs(startTime);
  if (!last.isValid()) return undefined;
  const day = dayjs.tz(raceDate, 'YYYY-MM-DD', RACE_TZ);
  return day.diff(last.tz(RACE_TZ).startOf('day'), 'day');
}
