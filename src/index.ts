#!/usr/bin/env -S node --import tsx/esm
import { config } from 'dotenv';
config({ path: 'config/.env' });
config({ path: '.env' });

import { Command } from 'commander';
import { registerThemesCommand } from './commands/themes.js';
import { registerMenuCommand } from './commands/menu.js';
import { registerPostCommand } from './commands/posts.js';
import { registerMediaCommand } from './commands/media.js';
import { registerUserCommand } from './commands/users.js';
import { registerBackupCommand } from './commands/backup.js';
import { registerGenerateCommand } from './commands/generate.js';

const program = new Command();

program
  .name('presso')
  .description('WordPress REST API 管理CLI（Gemini による記事生成付き）')
  .version('0.1.0');

registerThemesCommand(program);
registerMenuCommand(program);
registerPostCommand(program);
registerMediaCommand(program);
registerUserCommand(program);
registerBackupCommand(program);
registerGenerateCommand(program);

program.addHelpText('after', `
Environment (config/.env または .env):
  WORDPRESS_URL, WORDPRESS_USERNAME, WORDPRESS_PASSWORD, GEMINI_API_KEY

Examples:
  $ presso themes list                     テーマ一覧
  $ presso generate "Benefits of AI" -p    記事を生成して下書き作成
  $ presso media upload cover.jpg          メディアをアップロード
  $ presso user delete 12 --reassign 1     ユーザーを削除
  $ presso backup                          バックアップ（プレースホルダ）
`);

await program.parseAsync();
