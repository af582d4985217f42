import { beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  getInput: vi.fn<(name: string) => string>(),
  setSecret: vi.fn(),
}));

vi.mock('@actions/core', () => ({
  getInput: mocks.getInput,
  setSecret: mocks.setSecret,
}));

import { getConfig, parseLabels } from '../src/env';

function withInputs(inputs: Record<string, string>) {
  mocks.getInput.mockImplementation((name: string) => inputs[name] ?? '');
}

describe('getConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    delete process.env.GITHUB_TOKEN;
    withInputs({});
  });

  it('uses defaults when no inputs are set', () => {
    expect(getConfig()).toEqual({
      labels: ['good first issue', 'good-first-issue', 'beginner-friendly'],
      dbPath: 'data/db.json',
      create: false,
      credentialsPath: 'credentials.json',
      dryRun: false,
      onlySave: false,
      maxAgeDays: 15,
      maxHistory: 100,
    });
    expect(mocks.setSecret).not.toHaveBeenCalled();
  });

  it('parses flags and paths', () => {
    withInputs({
      labels: 'help wanted, good first issue,,',
      'db-path': 'state/issues.json',
      create: 'TRUE',
      'credentials-path': 'secrets/x.json',
      'dry-run': 'true',
      'only-save': 'false',
      'max-age-days': '7',
      'max-history': '250',
    });

    const cfg = getConfig();

    expect(cfg.labels).toEqual(['help wanted', 'good first issue']);
    expect(cfg.dbPath).toBe('state/issues.json');
    expect(cfg.create).toBe(true);
    expect(cfg.credentialsPath).toBe('secrets/x.json');
    expect(cfg.dryRun).toBe(true);
    expect(cfg.onlySave).toBe(false);
    expect(cfg.maxAgeDays).toBe(7);
    expect(cfg.maxHistory).toBe(250);
  });

  it('falls back to defaults for unusable numbers', () => {
    withInputs({ 'max-age-days': 'soon', 'max-history': '-5' });
    const cfg = getConfig();
    expect(cfg.maxAgeDays).toBe(15);
    expect(cfg.maxHistory).toBe(100);
  });

  it('prefers the token input over GITHUB_TOKEN and masks it', () => {
    process.env.GITHUB_TOKEN = 'env-token';
    expect(getConfig().token).toBe('env-token');

    withInputs({ 'github-token': 'input-token' });
    expect(getConfig().token).toBe('input-token');
    expect(mocks.setSecret).toHaveBeenLastCalledWith('input-token');
  });
});

describe('parseLabels', () => {
  it('returns undefined for blank input', () => {
    expect(parseLabels('')).toBeUndefined();
    expect(parseLabels(' , ')).toBeUndefined();
  });
});
