import { describe, it, expect } from 'vitest';
import {
  bestBetsByMeeting,
  buildBatchPrompt,
  formatFormParts,
  formatRaceBlock,
  freshnessLabel,
  mergeResults,
  orderPicks,
  parseAnalyzerResponse,
  partition,
  pickKey,
  ratingTier,
  stripFences,
} from './batch';
import type { MeetingRecord, RacePick, RaceRecord, RunnerRecord } from './types';

function runner(over: Partial<RunnerRecord> = {}): RunnerRecord {
  return { number: 1, name: 'Alpha', barrier: '3', jockey: 'J Smith', trainer: 'T Jones', scratched: false, ...over };
}

function race(over: Partial<RaceRecord> = {}): RaceRecord {
  return {
    track: 'Randwick',
    location: 'NSW',
    trackCondition: 'Good 4',
    trackWet: false,
    raceNumber: 1,
    raceName: 'Maiden Plate',
    distance: 1200,
    startTime: '',
    runners: [runner({ winFixed: 3 })],
    ...over,
  };
}

function pick(track: string, raceNumber: number, name: string, rating = '★ TIP'): RacePick {
  return { track, raceNumber, pick: name, rating, tier: ratingTier(rating), analysis: '' };
}

const okResponse = (picks: string) => `{"picks": [${picks}]}`;

describe('partition', () => {
  it('splits in order with a smaller final batch', () => {
    expect(partition([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns no batches for no races', () => {
    expect(partition([], 3)).toEqual([]);
  });

  it('clamps the batch size to at least one', () => {
    expect(partition(['a', 'b'], 0)).toEqual([['a'], ['b']]);
  });
});

describe('formatRaceBlock', () => {
  it('renders header, runner, form and last run lines', () => {
    const r = race({
      raceNumber: 3,
      raceName: 'BM 64 Handicap',
      trackCondition: 'Soft 6',
      trackWet: true,
      runners: [
        runner({
          number: 4,
          weight: 58.5,
          winFixed: 4.5,
          placeFixed: 1.8,
          career: { wins: 2, runs: 10 },
          surfacePreference: 'wet-tracker',
          wetPlaces: [2, 1, 0],
          daysSince: 70,
          jockeyRecord: { wins: 10, runs: 50 },
          gradeChange: { kind: 'drops', label: 'drops in class (BM 78 -> BM 64)' },
          speedRating: 3,
          contextStats: { track: { runs: 3, wins: 1, seconds: 1, thirds: 0 } },
          lastRun: { position: 2, margin: 1.5, venue: 'Rosehill', distance: 1600 },
        }),
      ],
    });
    expect(formatRaceBlock(r)).toBe(
      [
        '--- Randwick R3 | BM 64 Handicap 1200m | Soft 6  *** WET TRACK *** ---',
        '  4. Alpha (B3) 58.5kg J:J Smith T:T Jones Win:$4.50 Pl:$1.80',
        '    [FORM] 2W/10R | *** WET TRACKER - ADVANTAGES TODAY *** | Wet:2-1-0 | RETURNING (70d) | J%:10W/50R(20%) | *** DROPS IN CLASS (BM 78 -> BM 64) *** | SpeedRating:3 | Track:1W/3R(33%)',
        '    [RUNS] 2nd (1.5L) Rosehill 1600m (70d ago)',
        '',
      ].join('\n')
    );
  });

  it('omits the form line when nothing is known', () => {
    expect(formatRaceBlock(race())).toBe(
      '--- Randwick R1 | Maiden Plate 1200m | Good 4 ---\n  1. Alpha (B3) J:J Smith T:T Jones Win:$3.00 Pl:-\n'
    );
  });

  it('truncates the last run summary', () => {
    const r = race({ runners: [runner({ lastRun: { position: 1, venue: 'X'.repeat(200) } })] });
    const runs = formatRaceBlock(r).split('\n').find((l) => l.startsWith('    [RUNS] '));
    expect(runs?.length).toBe('    [RUNS] '.length + 110);
  });
});

describe('formatFormParts', () => {
  it('flags surface preference against the going', () => {
    const dry = runner({ surfacePreference: 'dry-preferred' });
    expect(formatFormParts(dry, true)).toEqual(['!! DRY PREFERRED - DISADVANTAGED TODAY']);
    expect(formatFormParts(dry, false)).toEqual(['DRY PREFERRED']);
  });

  it('emphasizes class rises as negative', () => {
    const r = runner({ gradeChange: { kind: 'rises', label: 'rises in class (BM 64 -> BM 78)' } });
    expect(formatFormParts(r, false)).toEqual(['!! RISES IN CLASS (BM 64 -> BM 78)']);
  });

  it('hides empty place splits', () => {
    expect(formatFormParts(runner({ dryPlaces: [0, 0, 0], wetPlaces: [1, 0, 2] }), false)).toEqual(['Wet:1-0-2']);
  });
});

describe('freshnessLabel', () => {
  it('labels fresh, regular and returning runners', () => {
    expect(freshnessLabel(13)).toBe('FRESH');
    expect(freshnessLabel(14)).toBe('14d');
    expect(freshnessLabel(60)).toBe('60d');
    expect(freshnessLabel(61)).toBe('RETURNING (61d)');
  });
});

describe('buildBatchPrompt', () => {
  it('asks the first batch for exactly five best bets', () => {
    const p = buildBatchPrompt([race()], '2026-08-20', true);
    expect(p.startsWith('You are an expert Australian horse racing analyst.')).toBe(true);
    expect(p).toContain('Horse Racing - 2026-08-20\n\n--- Randwick R1 | Maiden Plate 1200m | Good 4 ---');
    expect(p).toContain('Mark exactly 5 of these races as ★★★ BEST BET (your strongest picks today).');
  });

  it('reserves best bets for outstanding value in later batches', () => {
    const p = buildBatchPrompt([race()], '2026-08-20', false);
    expect(p).toContain('Use ★★★ BEST BET only for outstanding value; otherwise ★★ or ★.');
    expect(p).not.toContain('Mark exactly 5');
  });
});

describe('parseAnalyzerResponse', () => {
  const alpha = '{"track":"Randwick","race_number":3,"pick":"Alpha","barrier":"3","odds":"$4.50","rating":"★★★ BEST BET","analysis":"Drops in class."}';

  it('parses a fenced response', () => {
    const res = parseAnalyzerResponse('```json\n' + okResponse(alpha) + '\n```');
    expect(res.status).toBe('ok');
    expect(res.picks).toEqual([
      {
        track: 'Randwick',
        raceNumber: 3,
        pick: 'Alpha',
        barrier: '3',
        odds: '$4.50',
        rating: '★★★ BEST BET',
        tier: 'best',
        analysis: 'Drops in class.',
      },
    ]);
  });

  it('skips leading prose', () => {
    expect(stripFences('Here you go:\n{"picks": []}')).toBe('{"picks": []}');
  });

  it('skips a leading line that contains braces', () => {
    expect(stripFences('Note {x}\n{"picks": []}')).toBe('{"picks": []}');
    const res = parseAnalyzerResponse('Note {x}\n' + okResponse(alpha));
    expect(res.status).toBe('ok');
    expect(res.picks.map((p) => p.pick)).toEqual(['Alpha']);
  });

  it('coerces numeric fields', () => {
    const res = parseAnalyzerResponse(okResponse('{"track":"Ascot","race_number":"5","pick":"Bravo","barrier":7,"rating":"★★ STRONG BET"}'));
    expect(res.picks[0]).toMatchObject({ raceNumber: 5, barrier: '7', tier: 'strong', analysis: '' });
  });

  it('drops malformed entries but keeps the rest', () => {
    const res = parseAnalyzerResponse(okResponse(`${alpha},{"track":"Ascot","race_number":2}`));
    expect(res.status).toBe('ok');
    expect(res.picks.map((p) => p.pick)).toEqual(['Alpha']);
  });

  it('recovers complete entries from truncated output', () => {
    const raw =
      '{"picks":[{"track":"A","race_number":1,"pick":"X","rating":"★ TIP","analysis":"ok"},' +
      '{"track":"B","race_number":2,"pick":"Y","rating":"★★ STRONG BET","analysis":"cut off he';
    const res = parseAnalyzerResponse(raw);
    expect(res.status).toBe('recovered');
    expect(res.picks.map((p) => `${p.track}:${p.pick}`)).toEqual(['A:X']);
  });

  it('treats non-JSON and missing picks as zero picks', () => {
    expect(parseAnalyzerResponse('I cannot help with that.')).toEqual({ status: 'failed', picks: [] });
    expect(parseAnalyzerResponse('{"result": []}')).toEqual({ status: 'failed', picks: [] });
  });
});

describe('ratingTier', () => {
  it('maps labels to tiers', () => {
    expect(ratingTier('★★★ BEST BET')).toBe('best');
    expect(ratingTier('Best Bet')).toBe('best');
    expect(ratingTier('★★ STRONG BET')).toBe('strong');
    expect(ratingTier('★ TIP')).toBe('tip');
    expect(ratingTier('')).toBe('tip');
  });
});

describe('mergeResults', () => {
  it('keys results by normalized track and race number', () => {
    expect(pickKey(' randwick', 3)).toBe('RANDWICK:3');
  });

  it('returns one entry per race across batches', () => {
    const merged = mergeResults([[pick('A', 1, 'X'), pick('A', 2, 'Y')], [pick('B', 1, 'Z')]]);
    expect(merged.size).toBe(3);
    expect(merged.get('B:1')?.pick).toBe('Z');
  });

  it('lets the last duplicate win', () => {
    const merged = mergeResults([[pick('Ascot', 1, 'First')], [pick('ASCOT', 1, 'Second')]]);
    expect(merged.size).toBe(1);
    expect(merged.get('ASCOT:1')?.pick).toBe('Second');
  });

  it('loses only the malformed batch', () => {
    const batches = [
      parseAnalyzerResponse(okResponse('{"track":"A","race_number":1,"pick":"X"}')).picks,
      parseAnalyzerResponse('not json').picks,
      parseAnalyzerResponse(okResponse('{"track":"C","race_number":1,"pick":"Z"}')).picks,
    ];
    expect([...mergeResults(batches).keys()]).toEqual(['A:1', 'C:1']);
  });
});

describe('picks by meeting', () => {
  const meetings: MeetingRecord[] = [
    { track: 'Randwick', location: 'NSW', trackCondition: 'Good 4', races: [race({ raceNumber: 1 }), race({ raceNumber: 2 })] },
    { track: 'Ascot', location: 'WA', trackCondition: 'Good 3', races: [race({ track: 'Ascot', raceNumber: 1 })] },
  ];
  const picks = mergeResults([
    [
      pick('Ascot', 1, 'Zulu', '★★★ BEST BET'),
      pick('Randwick', 2, 'Yankee', '★★★ BEST BET'),
      pick('Randwick', 1, 'Xray', '★★ STRONG BET'),
      pick('Nowhere', 9, 'Whiskey'),
    ],
  ]);

  it('orders picks by meeting and race, leaving unknown races last', () => {
    expect(orderPicks(meetings, picks).map((p) => p.pick)).toEqual(['Xray', 'Yankee', 'Zulu', 'Whiskey']);
  });

  it('takes the first best bet of each meeting', () => {
    expect(bestBetsByMeeting(meetings, picks).map((b) => `${b.track} R${b.raceNumber} ${b.pick.pick}`)).toEqual([
      'Randwick R2 Yankee',
      'Ascot R1 Zulu',
    ]);
  });
});
