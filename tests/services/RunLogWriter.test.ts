import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { RunRecord } from '../../src/models';
import { RunLogWriter, runLogFileName } from '../../src/services/RunLogWriter';

const record: RunRecord = {
  runTimestamp: '2026-01-05T07:03:09.000Z',
  config: {
    model: 'llama3.2',
    relevanceThreshold: 4,
    entriesPerFeed: 10,
    titleMultiplier: 2,
    normalizationDivisor: 6,
    keywordTiers: { USV: 3 },
  },
  summary: {
    articlesScored: 0,
    articlesHits: 0,
    opportunitiesScored: 0,
    opportunitiesHits: 0,
  },
  articles: [],
  opportunities: [],
};

describe('RunLogWriter', () => {
  let tmpDir: string;
  const date = new Date(2026, 0, 5, 7, 3, 9);

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'run-log-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('names files by local date and time', () => {
    expect(runLogFileName(date)).toBe('run_2026-01-05_070309.json');
  });

  it('writes the record as pretty-printed JSON, creating the directory', async () => {
    const writer = new RunLogWriter(path.join(tmpDir, 'output'));

    const filePath = await writer.write(record, date);

    expect(filePath).toBe(path.join(tmpDir, 'output', 'run_2026-01-05_070309.json'));
    const content = await fs.readFile(filePath, 'utf8');
    expect(content).toBe(`${JSON.stringify(record, null, 2)}\n`);
    expect(JSON.parse(content)).toEqual(record);
  });

  it('never overwrites an existing log', async () => {
    const writer = new RunLogWriter(tmpDir);
    await writer.write(record, date);

    await expect(writer.write(record, date)).rejects.toMatchObject({
      code: 'EEXIST',
    });
  });
});
