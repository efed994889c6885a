import { readFileSync } from 'fs';
import { basename } from 'path';
import type { z } from 'zod';
import { ConfigSchema, validateCredentials } from '../config/schema.js';
import type { Config, CredentialsInput, SiteCredentials } from '../config/schema.js';
import { createAiClient } from '../ai/client.js';
import type { AiClient } from '../ai/client.js';
import { generateArticle } from '../ai/generator.js';
import type { GeneratedArticle } from '../ai/types.js';
import { writeBackupPlaceholder } from '../store/backup.js';
import {
  AuthenticationError,
  ConfigurationError,
  FileAccessError,
  PressoError,
  RemoteRequestError,
  toErrorMessage,
} from '../utils/error.js';
import {
  TokenResponseSchema,
  WPEntitySchema,
  WPRecordSchema,
  WPThemeListSchema,
} from './types.js';
import type {
  CreatePostInput,
  CreateUserInput,
  MenuItemInput,
  PostType,
  UpdatePostInput,
  UpdateUserInput,
  WPEntity,
  WPRecord,
  WPTheme,
} from './types.js';

export type SessionHeaders = Readonly<{
  Authorization: string;
  'Content-Type': string;
}>;

export interface SiteClientOptions {
  settings?: Config;
  fetch?: typeof fetch;
  aiClient?: AiClient;
}

interface RequestOptions<S extends z.ZodTypeAny> {
  operation: string;
  context: string;
  url: string;
  init: RequestInit;
  schema: S;
  timeoutMs: number;
}

function logFailure<E extends PressoError>(operation: string, context: string, error: E): E {
  const suffix = context ? ` (${context})` : '';
  console.error(`${operation} に失敗しました${suffix}: ${error.message}`);
  return error;
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable body: ${toErrorMessage(error)}>`;
  }
}

async function send<S extends z.ZodTypeAny>(fetchImpl: typeof fetch, request: RequestOptions<S>): Promise<z.output<S>> {
  const { operation, context, url, init, schema, timeoutMs } = request;

  let response: Response;
  try {
    response = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw logFailure(operation, context, new RemoteRequestError(
      `${init.method ?? 'GET'} ${url} failed: ${toErrorMessage(error)}`,
      { operation, url, cause: error },
    ));
  }

  if (!response.ok) {
    const body = await readErrorBody(response);
    throw logFailure(operation, context, new RemoteRequestError(
      `${init.method ?? 'GET'} ${url} returned HTTP ${response.status}: ${body}`,
      { operation, url, status: response.status, body },
    ));
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw logFailure(operation, context, new RemoteRequestError(
      `${url} returned a body that is not JSON: ${toErrorMessage(error)}`,
      { operation, url, status: response.status, cause: error },
    ));
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw logFailure(operation, context, new RemoteRequestError(
      `${url} returned an unexpected response: ${parsed.error.message}`,
      { operation, url, status: response.status, cause: parsed.error },
    ));
  }
  return parsed.data;
}

/**
 * WordPress REST API クライアント。
 *
 * 生成時に JWT を1回だけ取得し、以降のリクエストはすべて同じヘッダーを使う。
 * 各メソッドはリクエストを1回だけ送り、失敗してもリトライしない。
 */
export class SiteClient {
  readonly apiUrl: string;

  private constructor(
    credentials: SiteCredentials,
    private readonly settings: Config,
    private readonly fetchImpl: typeof fetch,
    readonly token: string,
    readonly headers: SessionHeaders,
    private readonly aiClient: AiClient,
  ) {
    this.apiUrl = `${credentials.siteUrl}/wp-json/wp/v2`;
  }

  static async connect(input: CredentialsInput, options: SiteClientOptions = {}): Promise<SiteClient> {
    let credentials: SiteCredentials;
    try {
      credentials = validateCredentials(input);
    } catch (error) {
      if (error instanceof ConfigurationError) throw logFailure('connect', '', error);
      throw error;
    }

    const settings = options.settings ?? ConfigSchema.parse({});
    const fetchImpl = options.fetch ?? fetch;

    const token = await SiteClient.authenticate(credentials, settings, fetchImpl);
    const headers: SessionHeaders = Object.freeze({
      Authorization: `Bearer ${token}`,
      'Content-Type': 'application/json',
    });

    const aiClient = options.aiClient ?? SiteClient.configureGemini(credentials, settings);
    return new SiteClient(credentials, settings, fetchImpl, token, headers, aiClient);
  }

  private static async authenticate(
    credentials: SiteCredentials,
    settings: Config,
    fetchImpl: typeof fetch,
  ): Promise<string> {
    try {
      const { token } = await send(fetchImpl, {
        operation: 'authenticate',
        context: credentials.username,
        url: `${credentials.siteUrl}/wp-json/jwt-auth/v1/token`,
        init: {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ username: credentials.username, password: credentials.password }),
        },
        schema: TokenResponseSchema,
        timeoutMs: settings.timeouts.requestMs,
      });
      return token;
    } catch (error) {
      throw new AuthenticationError(`Authentication failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  private static configureGemini(credentials: SiteCredentials, settings: Config): AiClient {
    try {
      return createAiClient(credentials.geminiApiKey, settings.gemini.model);
    } catch (error) {
      const configError = error instanceof ConfigurationError
        ? error
        : new ConfigurationError(`Failed to configure Gemini: ${toErrorMessage(error)}`, { cause: error });
      throw logFailure('configureGemini', settings.gemini.model, configError);
    }
  }

  private json<S extends z.ZodTypeAny>(
    operation: string,
    context: string,
    method: 'GET' | 'POST' | 'DELETE',
    url: string,
    schema: S,
    body?: unknown,
  ): Promise<z.output<S>> {
    return send(this.fetchImpl, {
      operation,
      context,
      url,
      init: {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      },
      schema,
      timeoutMs: this.settings.timeouts.requestMs,
    });
  }

  private resourceUrl(postType: PostType, postId?: number): string {
    const collection = `${this.apiUrl}/${postType}s`;
    return postId === undefined ? collection : `${collection}/${postId}`;
  }

  // --- テーマ ---

  async listThemes(): Promise<WPTheme[]> {
    return this.json('listThemes', '', 'GET', `${this.apiUrl}/themes`, WPThemeListSchema);
  }

  async activateTheme(slug: string): Promise<WPRecord> {
    return this.json('activateTheme', slug, 'POST', `${this.apiUrl}/settings`, WPRecordSchema, { theme: slug });
  }

  // --- メニュー ---

  // 標準の WordPress には存在しないエンドポイントの可能性がある
  async updateMenu(menuId: number, items: MenuItemInput[]): Promise<WPEntity> {
    return this.json('updateMenu', `menu ${menuId}`, 'POST', `${this.apiUrl}/menus/${menuId}`, WPEntitySchema, { items });
  }

  // --- 投稿・固定ページ ---

  async createPost(input: CreatePostInput): Promise<WPEntity> {
    const postType = input.postType ?? 'post';
    const body: Record<string, unknown> = {
      title: input.title,
      content: input.content,
      status: input.status ?? 'publish',
      type: postType,
    };
    if (input.categories && input.categories.length > 0) body.categories = input.categories;
    if (input.featuredImageId) body.featured_media = input.featuredImageId;

    return this.json('createPost', `${postType} "${input.title}"`, 'POST', this.resourceUrl(postType), WPEntitySchema, body);
  }

  async updatePost(postId: number, input: UpdatePostInput = {}): Promise<WPEntity> {
    const postType = input.postType ?? 'post';
    const body: Record<string, unknown> = {};
    // 空文字・0 は未指定として扱い、送信しない
    if (input.title) body.title = input.title;
    if (input.content) body.content = input.content;
    if (input.categories && input.categories.length > 0) body.categories = input.categories;
    if (input.featuredImageId) body.featured_media = input.featuredImageId;
    if (input.status) body.status = input.status;

    return this.json('updatePost', `${postType} ${postId}`, 'POST', this.resourceUrl(postType, postId), WPEntitySchema, body);
  }

  // ゴミ箱への移動になるか完全削除になるかはサイト側の設定次第
  async deletePost(postId: number, postType: PostType = 'post'): Promise<WPRecord> {
    return this.json('deletePost', `${postType} ${postId}`, 'DELETE', this.resourceUrl(postType, postId), WPRecordSchema);
  }

  // --- メディア ---

  async uploadMedia(filePath: string, altText: string = '', description: string = ''): Promise<WPEntity> {
    let data: Buffer;
    try {
      data = readFileSync(filePath);
    } catch (error) {
      throw logFailure('uploadMedia', filePath, new FileAccessError(
        `Cannot read ${filePath}: ${toErrorMessage(error)}`,
        filePath,
        error,
      ));
    }

    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(data)]), basename(filePath));
    form.append('alt_text', altText);
    form.append('description', description);

    // Content-Type は multipart エンコーダに任せる
    return send(this.fetchImpl, {
      operation: 'uploadMedia',
      context: filePath,
      url: `${this.apiUrl}/media`,
      init: {
        method: 'POST',
        headers: { Authorization: this.headers.Authorization },
        body: form,
      },
      schema: WPEntitySchema,
      timeoutMs: this.settings.timeouts.uploadMs,
    });
  }

  // --- ユーザー ---

  async createUser(input: CreateUserInput): Promise<WPEntity> {
    const body = {
      username: input.username,
      email: input.email,
      password: input.password,
      roles: [input.role],
    };
    return this.json('createUser', input.username, 'POST', `${this.apiUrl}/users`, WPEntitySchema, body);
  }

  async updateUser(userId: number, input: UpdateUserInput = {}): Promise<WPEntity> {
    const body: Record<string, unknown> = {};
    if (input.email) body.email = input.email;
    if (input.role) body.roles = [input.role];

    return this.json('updateUser', `user ${userId}`, 'POST', `${this.apiUrl}/users/${userId}`, WPEntitySchema, body);
  }

  // 投稿を持つユーザーを削除するときは reassign で移譲先を指定する
  async deleteUser(userId: number, reassign?: number): Promise<WPRecord> {
    const query = reassign ? `?reassign=${reassign}` : '';
    return this.json('deleteUser', `user ${userId}`, 'DELETE', `${this.apiUrl}/users/${userId}${query}`, WPRecordSchema);
  }

  // --- バックアップ ---

  backupSite(backupPath: string): string {
    try {
      return writeBackupPlaceholder(backupPath);
    } catch (error) {
      if (error instanceof PressoError) throw logFailure('backupSite', backupPath, error);
      throw error;
    }
  }

  // --- Gemini による記事生成 ---

  async generateArticleWithGemini(topic: string, length: string = 'medium'): Promise<GeneratedArticle> {
    try {
      return await generateArticle(this.aiClient, topic, length, this.settings.output);
    } catch (error) {
      throw logFailure('generateArticleWithGemini', topic, new RemoteRequestError(
        `Gemini (${this.aiClient.model}) failed: ${toErrorMessage(error)}`,
        { operation: 'generateArticleWithGemini', cause: error },
      ));
    }
  }
}
