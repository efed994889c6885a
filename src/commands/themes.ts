import { Command } from 'commander';
import { connect, failCommand, printJson } from './shared.js';
import type { ConfigOption } from './shared.js';

export function registerThemesCommand(program: Command): void {
  const themes = program
    .command('themes')
    .description('テーマの一覧表示・有効化');

  themes
    .command('list')
    .description('インストール済みテーマの一覧を表示')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .action(async (options: ConfigOption) => {
      try {
        const { client } = await connect(options);
        const list = await client.listThemes();
        console.log('インストール済みテーマ:');
        list.forEach((theme, index) => {
          const name = theme.name?.rendered ?? theme.name?.raw ?? theme.stylesheet;
          const status = theme.status === 'active' ? ' [有効]' : '';
          console.log(`  ${index + 1}. ${theme.stylesheet} - ${name}${status}`);
        });
      } catch (error) {
        failCommand('themes list', error);
      }
    });

  themes
    .command('activate <slug>')
    .description('指定したテーマを有効化')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .addHelpText('after', `
Examples:
  $ presso themes activate twentytwentyfive
`)
    .action(async (slug: string, options: ConfigOption) => {
      try {
        const { client } = await connect(options);
        const settings = await client.activateTheme(slug);
        console.log(`テーマ ${slug} を有効化しました。`);
        printJson(settings);
      } catch (error) {
        failCommand('themes activate', error);
      }
    });
}
