import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { backupPath, saveHistory } from '../src/storage';
import { createLogger, makeIssue } from './helpers';

const mocks = vi.hoisted(() => ({
  renameSync: vi.fn(),
}));

vi.mock('fs', async importOriginal => {
  const actual = await importOriginal<typeof import('fs')>();
  mocks.renameSync.mockImplementation(actual.renameSync);
  return { ...actual, renameSync: mocks.renameSync };
});

describe('saveHistory when the rename fails', () => {
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'first-timers-rename-'));
    dbPath = path.join(tempDir, 'db.json');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('removes the temporary file and leaves the old history in place', () => {
    const previous = JSON.stringify([makeIssue(1)], null, 2);
    fs.writeFileSync(dbPath, previous, 'utf8');
    mocks.renameSync.mockImplementationOnce(() => {
      throw new Error('EXDEV: cross-device link not permitted');
    });
    const log = createLogger();

    expect(() => saveHistory([makeIssue(2), makeIssue(1)], dbPath, 100, log)).toThrow(
      'EXDEV: cross-device link not permitted'
    );

    expect(fs.existsSync(`${dbPath}.tmp`)).toBe(false);
    expect(fs.readFileSync(dbPath, 'utf8')).toBe(previous);
    expect(fs.readFileSync(backupPath(dbPath), 'utf8')).toBe(previous);
    expect(log.error).toHaveBeenCalledWith(
      `⚠️ Failed to save ${dbPath}: EXDEV: cross-device link not permitted`
    );
  });

  it('renames normally otherwise', () => {
    saveHistory([makeIssue(3)], dbPath, 100, createLogger());

    expect(mocks.renameSync).toHaveBeenCalledWith(`${dbPath}.tmp`, dbPath);
    expect(fs.existsSync(`${dbPath}.tmp`)).toBe(false);
  });
});
