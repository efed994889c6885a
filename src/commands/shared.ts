import { loadConfig, readCredentialsFromEnv } from '../config/schema.js';
import type { Config } from '../config/schema.js';
import { SiteClient } from '../wordpress/client.js';
import { toErrorMessage } from '../utils/error.js';

export interface ConfigOption {
  config: string;
}

export async function connect(options: ConfigOption): Promise<{ client: SiteClient; config: Config }> {
  const config = loadConfig(options.config);
  const client = await SiteClient.connect(readCredentialsFromEnv(), { settings: config });
  return { client, config };
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function parseId(value: string, label: string = 'ID'): number {
  const id = Number(value);
  if (value.trim() === '' || !Number.isInteger(id) || id < 0) {
    throw new Error(`${label} は0以上の整数で指定してください: ${value}`);
  }
  return id;
}

// "1,2,3" → [1, 2, 3]
export function parseIdList(value: string): number[] {
  return value
    .split(',')
    .map(part => part.trim())
    .filter(part => part !== '')
    .map(part => parseId(part, 'カテゴリID'));
}

export function failCommand(command: string, error: unknown): never {
  console.error(`${command} コマンドでエラーが発生しました: ${toErrorMessage(error)}`);
  process.exit(1);
}
