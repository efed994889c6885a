import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { format } from 'date-fns';
import { FileAccessError, toErrorMessage } from '../utils/error.js';

export const BACKUP_PLACEHOLDER =
  'Simulated WordPress backup. Use a plugin such as UpdraftPlus for a real backup.';

export function backupFileName(now: Date): string {
  return `backup_${format(now, 'yyyyMMdd_HHmmss')}.zip`;
}

/**
 * バックアップのプレースホルダ。
 * 拡張子は .zip だが中身は固定のテキストで、サイトの内容は含まない。
 */
export function writeBackupPlaceholder(backupPath: string, now: Date = new Date()): string {
  const filePath = join(backupPath, backupFileName(now));
  try {
    mkdirSync(backupPath, { recursive: true });
    writeFileSync(filePath, BACKUP_PLACEHOLDER, 'utf-8');
  } catch (error) {
    throw new FileAccessError(`Failed to write backup ${filePath}: ${toErrorMessage(error)}`, filePath, error);
  }
  return filePath;
}
