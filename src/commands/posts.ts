import { Command } from 'commander';
import { z } from 'zod';
import { connect, failCommand, parseId, parseIdList, printJson } from './shared.js';
import type { ConfigOption } from './shared.js';

export const PostStatusSchema = z.enum(['publish', 'draft', 'pending', 'private', 'future']);

interface PostFieldOptions extends ConfigOption {
  title?: string;
  content?: string;
  categories?: string;
  featuredImage?: string;
  status?: string;
  type: string;
}

function addPostFieldOptions(command: Command): Command {
  return command
    .option('--categories <ids>', 'カテゴリIDのカンマ区切り (例: 1,2)')
    .option('--featured-image <id>', 'アイキャッチ画像のメディアID')
    .option('-t, --type <type>', '投稿タイプ (post / page)', 'post')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml');
}

export function registerPostCommand(program: Command): void {
  const post = program
    .command('post')
    .description('投稿・固定ページの作成/更新/削除');

  addPostFieldOptions(
    post
      .command('create')
      .description('投稿または固定ページを作成')
      .requiredOption('--title <title>', 'タイトル')
      .requiredOption('--content <content>', '本文')
      .option('-s, --status <status>', '公開状態 (publish / draft / ...)', 'publish'),
  )
    .addHelpText('after', `
Examples:
  $ presso post create --title "Hello" --content "<p>Body</p>" --status draft
  $ presso post create --title "About" --content "..." --type page
`)
    .action(async (options: PostFieldOptions & { title: string; content: string }) => {
      try {
        const { client } = await connect(options);
        const created = await client.createPost({
          title: options.title,
          content: options.content,
          categories: options.categories ? parseIdList(options.categories) : undefined,
          featuredImageId: options.featuredImage ? parseId(options.featuredImage, 'メディアID') : undefined,
          status: PostStatusSchema.parse(options.status),
          postType: options.type,
        });
        console.log(`${options.type} "${options.title}" を作成しました (ID: ${created.id})。`);
        printJson(created);
      } catch (error) {
        failCommand('post create', error);
      }
    });

  addPostFieldOptions(
    post
      .command('update <id>')
      .description('投稿または固定ページを更新（指定した項目のみ送信）')
      .option('--title <title>', 'タイトル')
      .option('--content <content>', '本文')
      .option('-s, --status <status>', '公開状態 (publish / draft / ...)'),
  )
    .addHelpText('after', `
Examples:
  $ presso post update 42 --featured-image 7 --status publish
`)
    .action(async (id: string, options: PostFieldOptions) => {
      try {
        const postId = parseId(id, '投稿ID');
        const { client } = await connect(options);
        const updated = await client.updatePost(postId, {
          postType: options.type,
          title: options.title,
          content: options.content,
          categories: options.categories ? parseIdList(options.categories) : undefined,
          featuredImageId: options.featuredImage ? parseId(options.featuredImage, 'メディアID') : undefined,
          status: options.status === undefined ? undefined : PostStatusSchema.parse(options.status),
        });
        console.log(`${options.type} ID ${postId} を更新しました。`);
        printJson(updated);
      } catch (error) {
        failCommand('post update', error);
      }
    });

  post
    .command('delete <id>')
    .description('投稿または固定ページを削除')
    .option('-t, --type <type>', '投稿タイプ (post / page)', 'post')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .action(async (id: string, options: ConfigOption & { type: string }) => {
      try {
        const postId = parseId(id, '投稿ID');
        const { client } = await connect(options);
        const result = await client.deletePost(postId, options.type);
        console.log(`${options.type} ID ${postId} を削除しました。`);
        printJson(result);
      } catch (error) {
        failCommand('post delete', error);
      }
    });
}
