import { Command } from 'commander';
import { connect, failCommand } from './shared.js';
import type { ConfigOption } from './shared.js';

export function registerBackupCommand(program: Command): void {
  program
    .command('backup [dir]')
    .description('バックアップのプレースホルダファイルを作成（実際のバックアップには専用プラグインを使用）')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .action(async (dir: string | undefined, options: ConfigOption) => {
      try {
        const { client, config } = await connect(options);
        const file = client.backupSite(dir ?? config.backup.dir);
        console.log(`バックアップを保存しました: ${file}`);
      } catch (error) {
        failCommand('backup', error);
      }
    });
}
