import { Command } from 'commander';
import { connect, failCommand, parseId, printJson } from './shared.js';
import type { ConfigOption } from './shared.js';

export function registerUserCommand(program: Command): void {
  const user = program
    .command('user')
    .description('ユーザーの作成/更新/削除');

  user
    .command('create <username> <email> <password> <role>')
    .description('ユーザーを作成')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .addHelpText('after', `
Examples:
  $ presso user create newuser new@example.com changeme editor
`)
    .action(async (username: string, email: string, password: string, role: string, options: ConfigOption) => {
      try {
        const { client } = await connect(options);
        const created = await client.createUser({ username, email, password, role });
        console.log(`ユーザー ${username} を権限 ${role} で作成しました (ID: ${created.id})。`);
        printJson(created);
      } catch (error) {
        failCommand('user create', error);
      }
    });

  user
    .command('update <id>')
    .description('ユーザーのメールアドレス・権限を更新')
    .option('--email <email>', 'メールアドレス')
    .option('--role <role>', '権限')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .action(async (id: string, options: ConfigOption & { email?: string; role?: string }) => {
      try {
        const userId = parseId(id, 'ユーザーID');
        const { client } = await connect(options);
        const updated = await client.updateUser(userId, { email: options.email, role: options.role });
        console.log(`ユーザー ID ${userId} を更新しました。`);
        printJson(updated);
      } catch (error) {
        failCommand('user update', error);
      }
    });

  user
    .command('delete <id>')
    .description('ユーザーを削除')
    .option('--reassign <id>', '投稿の移譲先ユーザーID')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .addHelpText('after', `
Examples:
  $ presso user delete 12 --reassign 1
`)
    .action(async (id: string, options: ConfigOption & { reassign?: string }) => {
      try {
        const userId = parseId(id, 'ユーザーID');
        const reassign = options.reassign === undefined ? undefined : parseId(options.reassign, '移譲先ユーザーID');
        const { client } = await connect(options);
        const result = await client.deleteUser(userId, reassign);
        console.log(`ユーザー ID ${userId} を削除しました。`);
        printJson(result);
      } catch (error) {
        failCommand('user delete', error);
      }
    });
}
