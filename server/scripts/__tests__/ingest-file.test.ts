import { describe, it, expect, beforeEach } from 'vitest';
import { MemStorage } from '../../memStorage';
import { fixturePath } from '../../services/__tests__/helpers';
import { runIngestFile } from '../ingest-file';

describe('ingest-file', () => {
  let storage: MemStorage;
  let lines: string[];
  const print = (line: string) => {
    lines.push(line);
  };

  beforeEach(() => {
    storage = new MemStorage();
    lines = [];
  });

  it('ingests a file with a detected provider and prints the report', async () => {
    const garmin = fixturePath('garmin_daily.csv');
    const { exitCode, report } = await runIngestFile([garmin, '--user', 'user-1', '--timezone', 'Europe/Berlin'], { storage, print });

    expect(exitCode).toBe(0);
    expect(report?.finalState).toBe('completed');
    expect(report?.persistedCount).toBe(5);
    expect(JSON.parse(lines[0])).toEqual(report);
    expect((await storage.getUserProfile('user-1'))?.timezone).toBe('Europe/Berlin');
  });

  it('exits with 1 when the job fails', async () => {
    const garmin = fixturePath('garmin_daily.csv');
    const { exitCode, report } = await runIngestFile([garmin, '--user', 'user-1', '--provider', 'apple_health'], { storage, print });

    expect(exitCode).toBe(1);
    expect(report?.finalState).toBe('failed');
    expect(report?.surfaceToUser).toBe(true);
  });

  it('prints the feed after ingestion when asked', async () => {
    const garmin = fixturePath('garmin_daily.csv');
    const { exitCode } = await runIngestFile([garmin, '--user', 'user-1', '--provider', 'garmin', '--insights'], { storage, print });

    expect(exitCode).toBe(0);
    expect(lines[lines.length - 1]).toBe('No significant insights yet.');
  });

  it('rejects missing arguments and unknown flags', async () => {
    expect((await runIngestFile(['--user', 'user-1'], { storage, print })).exitCode).toBe(2);
    expect(lines[0]).toMatch(/^Usage: /);

    lines = [];
    expect((await runIngestFile(['file.csv', '--user', 'user-1', '--verbose'], { storage, print })).exitCode).toBe(2);
    expect(lines[1]).toMatch(/^Usage: /);
  });

  it('rejects an unknown provider', async () => {
    const { exitCode } = await runIngestFile(['file.csv', '--user', 'user-1', '--provider', 'polar'], { storage, print });

    expect(exitCode).toBe(2);
    expect(lines).toEqual(['Unknown provider "polar". Expected one of: fitbit, oura, apple_health, cronometer, garmin']);
  });

  it('asks for a provider when it cannot be detected', async () => {
    const unknown = fixturePath('unknown.csv');
    const { exitCode, report } = await runIngestFile([unknown, '--user', 'user-1'], { storage, print });

    expect(exitCode).toBe(2);
    expect(report).toBeNull();
    expect(lines).toEqual([`Could not detect the provider of ${unknown}; pass --provider`]);
  });
});
