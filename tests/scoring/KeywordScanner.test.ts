import { scanKeywords } from '../../src/scoring/KeywordScanner';
import {
  createTierTable,
  loadKeywordTiers,
} from '../../src/scoring/keywordTiers';
import { testTiers } from '../factories';

describe('scanKeywords', () => {
  it('saturates on two top-weight title matches', async () => {
    const tiers = await loadKeywordTiers();

    const result = scanKeywords('Anduril unveils new USV', '', tiers);

    expect(result.keywordScore).toBe(10);
    expect(result.matches).toEqual([
      { keyword: 'Anduril', weight: 3, location: 'title' },
      { keyword: 'USV', weight: 3, location: 'title' },
    ]);
  });

  it('returns zero and no matches when nothing matches', () => {
    const result = scanKeywords(
      'City council approves budget',
      'Local parks get new benches',
      testTiers,
    );

    expect(result.keywordScore).toBe(0);
    expect(result.matches).toEqual([]);
  });

  it('counts a body match at its plain weight', () => {
    const result = scanKeywords('Weekly roundup', 'More naval news', testTiers);

    // 1 / 6 * 10 = 1.67
    expect(result.keywordScore).toBe(1.7);
    expect(result.matches).toEqual([
      { keyword: 'naval', weight: 1, location: 'body' },
    ]);
  });

  it('records a keyword found in both title and body once, as a title match', () => {
    const result = scanKeywords('Naval update', 'naval forces deploy', testTiers);

    // 1 * 2 / 6 * 10 = 3.33
    expect(result.keywordScore).toBe(3.3);
    expect(result.matches).toEqual([
      { keyword: 'naval', weight: 1, location: 'title' },
    ]);
  });

  it('matches whole words only', () => {
    const result = scanKeywords('MSCellaneous notes', 'The USVs are ready', testTiers);

    expect(result.matches).toEqual([]);
    expect(result.keywordScore).toBe(0);
  });

  it('does not match inside a word that continues with a non-ASCII letter', () => {
    const tiers = createTierTable({ naval: 1, MAP: 3 });

    const result = scanKeywords('Navalé exercise', 'MAPÜ rollout', tiers);

    expect(result.keywordScore).toBe(0);
    expect(result.matches).toEqual([]);
  });

  it('matches next to punctuation and non-ASCII neighbours separated by spaces', () => {
    const tiers = createTierTable({ naval: 1, MAP: 3 });

    const result = scanKeywords('Élan: naval, drills', '(MAP) über alles', tiers);

    // 1 * 2 + 3 = 5 -> 8.33
    expect(result.keywordScore).toBe(8.3);
    expect(result.matches).toEqual([
      { keyword: 'naval', weight: 1, location: 'title' },
      { keyword: 'MAP', weight: 3, location: 'body' },
    ]);
  });

  it('matches case-insensitively and across multi-word keywords', () => {
    const result = scanKeywords(
      'Budget notes',
      'ANDURIL and the coast guard sign a deal',
      testTiers,
    );

    // 3 + 1 = 4 -> 6.67
    expect(result.keywordScore).toBe(6.7);
    expect(result.matches.map((m) => m.keyword)).toEqual([
      'Anduril',
      'Coast Guard',
    ]);
  });

  it('matches keywords containing punctuation', () => {
    const tiers = createTierTable({ 'Dive-LD': 3, 'Low-cost': 2 });

    const result = scanKeywords('Dive-LD trials', 'a low-cost design', tiers);

    // 3 * 2 + 2 = 8 -> capped at 10
    expect(result.keywordScore).toBe(10);
    expect(result.matches).toEqual([
      { keyword: 'Dive-LD', weight: 3, location: 'title' },
      { keyword: 'Low-cost', weight: 2, location: 'body' },
    ]);
  });

  it('applies custom multiplier and divisor', () => {
    const result = scanKeywords('USV contract', '', testTiers, {
      titleMultiplier: 3,
      normalizationDivisor: 12,
    });

    // 3 * 3 / 12 * 10 = 7.5
    expect(result.keywordScore).toBe(7.5);
  });

  it('gives a title match at least as many points as a body match', () => {
    for (const keyword of ['Anduril', 'MSC', 'naval']) {
      const inTitle = scanKeywords(`${keyword} news`, '', testTiers);
      const inBody = scanKeywords('News', `${keyword} news`, testTiers);
      expect(inTitle.keywordScore).toBeGreaterThanOrEqual(inBody.keywordScore);
    }
  });

  it('never decreases as more keywords match and stays within 0-10', () => {
    const bodies = [
      '',
      'naval',
      'naval shipyard',
      'naval shipyard readiness',
      'naval shipyard readiness MSC',
      'naval shipyard readiness MSC Anduril USV',
    ];

    let previous = 0;
    for (const body of bodies) {
      const { keywordScore } = scanKeywords('Update', body, testTiers);
      expect(keywordScore).toBeGreaterThanOrEqual(previous);
      expect(keywordScore).toBeGreaterThanOrEqual(0);
      expect(keywordScore).toBeLessThanOrEqual(10);
      previous = keywordScore;
    }
  });

  it('returns identical results for identical input', () => {
    const first = scanKeywords('Naval USV test', 'Coast Guard readiness', testTiers);
    const second = scanKeywords('Naval USV test', 'Coast Guard readiness', testTiers);

    expect(second).toEqual(first);
  });

  it('returns a frozen result', () => {
    const result = scanKeywords('USV', '', testTiers);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.matches)).toBe(true);
  });
});
