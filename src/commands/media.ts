import { Command } from 'commander';
import { connect, failCommand, printJson } from './shared.js';
import type { ConfigOption } from './shared.js';

export function registerMediaCommand(program: Command): void {
  const media = program
    .command('media')
    .description('メディアライブラリの管理');

  media
    .command('upload <file>')
    .description('画像や動画をメディアライブラリにアップロード')
    .option('--alt <text>', '代替テキスト', '')
    .option('--description <text>', '説明', '')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .addHelpText('after', `
Examples:
  $ presso media upload ./images/cover.jpg --alt "Cover image"
`)
    .action(async (file: string, options: ConfigOption & { alt: string; description: string }) => {
      try {
        const { client } = await connect(options);
        const uploaded = await client.uploadMedia(file, options.alt, options.description);
        console.log(`メディア ${file} をアップロードしました (ID: ${uploaded.id})。`);
        printJson(uploaded);
      } catch (error) {
        failCommand('media upload', error);
      }
    });
}
