import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { BACKUP_PLACEHOLDER, backupFileName, writeBackupPlaceholder } from './backup.js';
import { FileAccessError } from '../utils/error.js';

describe('backup placeholder', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'presso-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('names the file after the local timestamp', () => {
    expect(backupFileName(new Date(2026, 0, 2, 3, 4, 5))).toBe('backup_20260102_030405.zip');
  });

  it('creates missing parent directories and writes the placeholder text', () => {
    const target = join(dir, 'a', 'b');

    const file = writeBackupPlaceholder(target, new Date(2026, 9, 19, 14, 30, 0));

    expect(file).toBe(join(target, 'backup_20261019_143000.zip'));
    expect(readdirSync(target)).toEqual(['backup_20261019_143000.zip']);
    expect(readFileSync(file, 'utf-8')).toBe(BACKUP_PLACEHOLDER);
  });

  it('reuses an existing directory', () => {
    writeBackupPlaceholder(dir, new Date(2026, 0, 1, 0, 0, 0));
    writeBackupPlaceholder(dir, new Date(2026, 0, 1, 0, 0, 1));

    expect(readdirSync(dir).sort()).toEqual([
      'backup_20260101_000000.zip',
      'backup_20260101_000001.zip',
    ]);
  });

  it('fails with FileAccessError when the directory cannot be created', () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');

    expect(() => writeBackupPlaceholder(join(blocker, 'sub'))).toThrow(FileAccessError);
  });
});
