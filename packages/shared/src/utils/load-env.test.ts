import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { findProjectRoot, loadEnvFromRoot } from './load-env.js';

describe('findProjectRoot', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'roadmap-env-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should find the nearest directory holding a .env file', () => {
    const nested = path.join(tmpDir, 'packages', 'api', 'src');
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(path.join(tmpDir, '.env'), 'API_PORT=9000\n');

    expect(findProjectRoot(nested)).toBe(path.resolve(tmpDir));
  });

  it('should prefer the closest .env', () => {
    const pkg = path.join(tmpDir, 'packages', 'cli');
    fs.mkdirSync(pkg, { recursive: true });
    fs.writeFileSync(path.join(tmpDir, '.env'), '');
    fs.writeFileSync(path.join(pkg, '.env'), '');

    expect(findProjectRoot(pkg)).toBe(path.resolve(pkg));
  });
});

describe('loadEnvFromRoot', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'roadmap-env-'));
  });

  afterEach(() => {
    delete process.env.ROADMAP_ENV_MARKER;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should load the found file and return its path', () => {
    const nested = path.join(tmpDir, 'packages', 'cli', 'src');
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(path.join(tmpDir, '.env'), 'ROADMAP_ENV_MARKER=from-file\n');

    expect(loadEnvFromRoot(nested)).toBe(path.join(path.resolve(tmpDir), '.env'));
    expect(process.env.ROADMAP_ENV_MARKER).toBe('from-file');
  });

  it('should keep variables that are already set', () => {
    fs.writeFileSync(path.join(tmpDir, '.env'), 'ROADMAP_ENV_MARKER=from-file\n');
    process.env.ROADMAP_ENV_MARKER = 'from-shell';

    loadEnvFromRoot(tmpDir);

    expect(process.env.ROADMAP_ENV_MARKER).toBe('from-shell');
  });
});
