import { Command } from 'commander';
import { connect, failCommand, parseIdList } from './shared.js';
import type { ConfigOption } from './shared.js';
import { PostStatusSchema } from './posts.js';

interface GenerateOptions extends ConfigOption {
  length: string;
  publish?: boolean;
  status: string;
  categories?: string;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate <topic>')
    .description('Gemini で記事を生成し、必要に応じて投稿として作成')
    .option('-l, --length <length>', '記事の長さ (short / medium / long)', 'medium')
    .option('-p, --publish', '生成した記事を投稿として作成する')
    .option('-s, --status <status>', '作成する投稿の公開状態', 'draft')
    .option('--categories <ids>', 'カテゴリIDのカンマ区切り (例: 1,2)')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .addHelpText('after', `
Examples:
  $ presso generate "Benefits of AI"                    記事を生成して表示
  $ presso generate "Benefits of AI" -l long -p         長めの記事を下書きとして作成
`)
    .action(async (topic: string, options: GenerateOptions) => {
      try {
        const status = PostStatusSchema.parse(options.status);
        const categories = options.categories ? parseIdList(options.categories) : undefined;
        const { client } = await connect(options);

        console.log(`生成中: ${topic}`);
        const article = await client.generateArticleWithGemini(topic, options.length);

        if (!options.publish) {
          console.log(`\n# ${article.title}\n\n${article.content}`);
          return;
        }

        const post = await client.createPost({
          title: article.title,
          content: article.content,
          categories,
          status,
        });
        console.log(`記事「${article.title}」を作成しました (ID: ${post.id}, 状態: ${status})。`);
      } catch (error) {
        failCommand('generate', error);
      }
    });
}
