import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  createTierTable,
  loadKeywordTiers,
  tierTableToRecord,
} from '../../src/scoring/keywordTiers';
import { ConfigError } from '../../src/utils/errors';

describe('keyword tiers', () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tiers-'));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('createTierTable', () => {
    it('builds a table in insertion order', () => {
      const tiers = createTierTable({ Anduril: 3, MSC: 2, naval: 1 });

      expect(Array.from(tiers.entries())).toEqual([
        ['Anduril', 3],
        ['MSC', 2],
        ['naval', 1],
      ]);
    });

    it.each([
      [{ Anduril: 4 }],
      [{ Anduril: 0 }],
      [{ Anduril: 1.5 }],
      [{ Anduril: '3' }],
      [{ '': 1 }],
      [{ ' naval': 1 }],
      [['Anduril']],
      [null],
    ])('rejects invalid data %p', (input) => {
      expect(() => createTierTable(input)).toThrow(ConfigError);
    });

    it('rejects keys that differ only by case', () => {
      expect(() => createTierTable({ USV: 3, usv: 2 })).toThrow(
        'Invalid keyword tiers: "usv" duplicates "USV"',
      );
    });

    it('rejects an empty table', () => {
      expect(() => createTierTable({})).toThrow(
        'Invalid keyword tiers: table is empty',
      );
    });
  });

  describe('loadKeywordTiers', () => {
    it('loads the bundled table', async () => {
      const tiers = await loadKeywordTiers();

      expect(tiers.size).toBe(46);
      expect(tiers.get('Anduril')).toBe(3);
      expect(tiers.get('DIU')).toBe(2);
      expect(tiers.get('supply chain')).toBe(1);
    });

    it('loads a table from a file', async () => {
      const filePath = path.join(tmpDir, 'custom.json');
      await fs.writeFile(filePath, JSON.stringify({ Sealift: 3, naval: 1 }));

      const tiers = await loadKeywordTiers(filePath);

      expect(tierTableToRecord(tiers)).toEqual({ Sealift: 3, naval: 1 });
    });

    it('fails with ConfigError for a missing file', async () => {
      await expect(
        loadKeywordTiers(path.join(tmpDir, 'missing.json')),
      ).rejects.toThrow(ConfigError);
    });

    it('fails with ConfigError for malformed JSON', async () => {
      const filePath = path.join(tmpDir, 'broken.json');
      await fs.writeFile(filePath, '{ "Sealift": ');

      await expect(loadKeywordTiers(filePath)).rejects.toThrow(/not valid JSON/);
    });
  });
});
