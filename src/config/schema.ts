import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { parse } from 'yaml';
import { ConfigurationError, toErrorMessage } from '../utils/error.js';

// Gemini設定
const GeminiSchema = z.object({
  model: z.string().min(1).default('gemini-1.5-flash'),
});

// 出力設定
const OutputSchema = z.object({
  tone: z.string().default('informative and engaging'),
  language: z.string().default('Indonesian'),
});

// タイムアウト設定（ミリ秒）
const TimeoutsSchema = z.object({
  requestMs: z.number().int().positive().default(10_000),
  uploadMs: z.number().int().positive().default(15_000),
});

// バックアップ設定
const BackupSchema = z.object({
  dir: z.string().min(1).default('backups'),
});

// 全体設定スキーマ
export const ConfigSchema = z.object({
  gemini: GeminiSchema.default({}),
  output: OutputSchema.default({}),
  timeouts: TimeoutsSchema.default({}),
  backup: BackupSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OutputConfig = z.infer<typeof OutputSchema>;

// 接続に必要な4つの値。どれか1つでも空なら起動できない
const requiredString = (envVar: string) =>
  z.string({ required_error: `${envVar} is not set` })
    .refine(value => value.trim() !== '', `${envVar} is not set`);

export const CredentialsSchema = z.object({
  siteUrl: requiredString('WORDPRESS_URL').transform(url => url.replace(/\/+$/, '')),
  username: requiredString('WORDPRESS_USERNAME'),
  password: requiredString('WORDPRESS_PASSWORD'),
  geminiApiKey: requiredString('GEMINI_API_KEY'),
});

export type SiteCredentials = z.infer<typeof CredentialsSchema>;
export type CredentialsInput = Partial<Record<keyof SiteCredentials, unknown>>;

export function validateCredentials(input: CredentialsInput): SiteCredentials {
  const result = CredentialsSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Missing configuration: ${issue?.message ?? 'invalid credentials'}`);
  }
  return result.data;
}

export function readCredentialsFromEnv(env: NodeJS.ProcessEnv = process.env): CredentialsInput {
  return {
    siteUrl: env.WORDPRESS_URL,
    username: env.WORDPRESS_USERNAME,
    password: env.WORDPRESS_PASSWORD,
    geminiApiKey: env.GEMINI_API_KEY,
  };
}

// config.yamlを読み込み、zodでバリデーションしてパース済みConfigオブジェクトを返す
// ファイルが存在しない場合はデフォルト値のみで構成する
export function loadConfig(configPath: string = 'config.yaml'): Config {
  if (!existsSync(configPath)) {
    return ConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read ${configPath}: ${toErrorMessage(error)}`, { cause: error });
  }

  const result = ConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigurationError(`Invalid ${configPath}: ${details}`);
  }
  return result.data;
}
