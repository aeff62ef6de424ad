import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { RunStore } from './db';
import { makeSite } from './test-utils';
import type { Report } from './types';

function buildReport(username: string, startedAt: number): Report {
  const github = makeSite('GitHub', { categories: ['coding'] });
  const lichess = makeSite('Lichess', { categories: ['gaming', 'social'] });
  return {
    username,
    verdicts: [
      { site: github, outcome: 'found', detail: 'HTTP 200', status: 200, confidence: 70, url: 'https://github.test/alice', elapsedMs: 41.6 },
      { site: lichess, outcome: 'failed', detail: 'timeout', status: 0, confidence: 0, url: 'https://lichess.test/alice', elapsedMs: 1000 },
    ],
    counts: { found: 1, 'not-found': 0, failed: 1 },
    foundByCategory: { coding: 1 },
    cancelled: false,
    warnings: [],
    startedAt,
    finishedAt: startedAt + 1200,
    elapsedMs: 1200,
  };
}

describe('RunStore', () => {
  let store: RunStore;

  beforeEach(() => {
    store = new RunStore({ dbPath: ':memory:' });
  });

  afterEach(() => {
    store.close();
  });

  test('saves a report and lists it', () => {
    const runId = store.saveReport(buildReport('alice', 1_700_000_000_000));

    expect(store.listRuns(10)).toEqual([
      {
        id: runId,
        username: 'alice',
        startedAt: 1_700_000_000_000,
        finishedAt: 1_700_000_001_200,
        cancelled: false,
        sitesTotal: 2,
        foundCount: 1,
        notFoundCount: 0,
        failedCount: 1,
      },
    ]);
  });

  test('keeps verdicts in report order', () => {
    const runId = store.saveReport(buildReport('alice', 1000));

    expect(store.getRunVerdicts(runId)).toEqual([
      {
        siteName: 'GitHub',
        categories: ['coding'],
        url: 'https://github.test/alice',
        outcome: 'found',
        statusCode: 200,
        confidence: 70,
        detail: 'HTTP 200',
        elapsedMs: 42,
      },
      {
        siteName: 'Lichess',
        categories: ['gaming', 'social'],
        url: 'https://lichess.test/alice',
        outcome: 'failed',
        statusCode: 0,
        confidence: 0,
        detail: 'timeout',
        elapsedMs: 1000,
      },
    ]);
    expect(store.getRunVerdicts(runId, 'found').map((row) => row.siteName)).toEqual(['GitHub']);
  });

  test('lists newest runs first, optionally by username', () => {
    const first = store.saveReport(buildReport('alice', 1000));
    const second = store.saveReport(buildReport('bob', 2000));
    const third = store.saveReport(buildReport('alice', 3000));

    expect(store.listRuns(10).map((run) => run.id)).toEqual([third, second, first]);
    expect(store.listRuns(1).map((run) => run.id)).toEqual([third]);
    expect(store.listRuns(10, 'alice').map((run) => run.id)).toEqual([third, first]);
  });

  test('adds the confidence column to an older store', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'namescout-history-'));
    const dbPath = path.join(dir, 'history.db');
    const legacy = new Database(dbPath);
    legacy.exec(`CREATE TABLE verdicts (
      run_id INTEGER NOT NULL,
      position INTEGER NOT NULL,
      site_name TEXT NOT NULL,
      categories TEXT NOT NULL,
      url TEXT NOT NULL,
      outcome TEXT NOT NULL,
      status_code INTEGER NOT NULL,
      detail TEXT,
      elapsed_ms INTEGER NOT NULL,
      PRIMARY KEY (run_id, site_name)
    )`);
    legacy.close();

    const upgraded = new RunStore({ dbPath });
    try {
      const runId = upgraded.saveReport(buildReport('alice', 1000));
      expect(upgraded.getRunVerdicts(runId, 'found')[0].confidence).toBe(70);
    } finally {
      upgraded.close();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
