import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, appendFileSync } from 'fs';
import { join } from 'path';
import os from 'os';
import { EventLog } from '../../src/logging/event-log.js';

describe('EventLog', () => {
  let tempDir: string;

  afterEach(() => {
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  function makeTempDir(): string {
    tempDir = join(os.tmpdir(), `context-filter-logs-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    return tempDir;
  }

  it('writes JSONL entries and exports bundles', () => {
    const log = new EventLog(makeTempDir());
    log.append('filter_start', { model: 'llama3.2:1b' });
    log.append('filter_summary', { reductionPercent: 80 });

    const entries = log.readRecent(10);
    expect(entries.length).toBe(2);
    expect(entries[0].type).toBe('filter_start');
    expect(entries[1].data).toEqual({ reductionPercent: 80 });

    const bundle = log.exportBundle(10);
    expect(bundle.app.name).toBe('context-filter-proxy');
    expect(bundle.entries.length).toBe(2);
  });

  it('returns only the most recent entries', () => {
    const log = new EventLog(makeTempDir());
    for (let i = 0; i < 5; i++) {
      log.append('passthrough', { n: i });
    }

    expect(log.readRecent(2).map(entry => entry.data.n)).toEqual([3, 4]);
    expect(log.readRecent(0)).toEqual([]);
  });

  it('skips corrupt lines', () => {
    const log = new EventLog(makeTempDir());
    log.append('filter_start', { model: 'a' });
    appendFileSync(log.getLogFile(), '{not json\n["array"]\n', 'utf8');
    log.append('filter_summary', { model: 'a' });

    expect(log.readRecent().map(entry => entry.type)).toEqual(['filter_start', 'filter_summary']);
  });

  it('creates the logs directory on demand', () => {
    const nested = join(makeTempDir(), 'deeper', 'logs');
    const log = new EventLog(nested);
    log.append('passthrough', {});

    expect(existsSync(join(nested, 'filter-events.jsonl'))).toBe(true);
  });
});
