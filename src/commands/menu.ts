import { readFileSync } from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { connect, failCommand, parseId, printJson } from './shared.js';
import type { ConfigOption } from './shared.js';

const MenuItemsSchema = z.array(
  z.object({ title: z.string(), url: z.string() }).passthrough(),
);

export function registerMenuCommand(program: Command): void {
  const menu = program
    .command('menu')
    .description('メニューの管理');

  menu
    .command('update <menu-id> <items-file>')
    .description('JSONファイルに記述したメニュー項目でメニューを更新')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .addHelpText('after', `
Examples:
  $ presso menu update 1 menu.json

menu.json:
  [{ "title": "Home", "url": "/" }, { "title": "About", "url": "/about" }]
`)
    .action(async (menuId: string, itemsFile: string, options: ConfigOption) => {
      try {
        const items = MenuItemsSchema.parse(JSON.parse(readFileSync(itemsFile, 'utf-8')));
        const { client } = await connect(options);
        const updated = await client.updateMenu(parseId(menuId, 'メニューID'), items);
        console.log(`メニュー ID ${menuId} を更新しました。`);
        printJson(updated);
      } catch (error) {
        failCommand('menu update', error);
      }
    });
}
