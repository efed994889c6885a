import { z } from 'zod';

// WordPress REST API のレスポンス型
// クライアント自身が参照するフィールドだけを型付けし、残りはそのまま通す

export const WPEntitySchema = z.object({ id: z.number() }).passthrough();
export type WPEntity = z.infer<typeof WPEntitySchema>;

export const WPThemeSchema = z.object({
  stylesheet: z.string(),
  status: z.string().optional(),
  name: z.object({ raw: z.string().optional(), rendered: z.string().optional() }).optional(),
}).passthrough();
export type WPTheme = z.infer<typeof WPThemeSchema>;

export const WPThemeListSchema = z.array(WPThemeSchema);

export const WPRecordSchema = z.record(z.unknown());
export type WPRecord = z.infer<typeof WPRecordSchema>;

export const TokenResponseSchema = z.object({ token: z.string().min(1) }).passthrough();

export type PostStatus = 'publish' | 'draft' | 'pending' | 'private' | 'future';

// 'post' → /posts, 'page' → /pages
export type PostType = 'post' | 'page' | (string & {});

export interface MenuItemInput {
  title: string;
  url: string;
  [key: string]: unknown;
}

export interface CreatePostInput {
  title: string;
  content: string;
  categories?: number[];
  featuredImageId?: number;
  status?: PostStatus;
  postType?: PostType;
}

export interface UpdatePostInput {
  postType?: PostType;
  title?: string;
  content?: string;
  categories?: number[];
  featuredImageId?: number;
  status?: PostStatus;
}

export interface CreateUserInput {
  username: string;
  email: string;
  password: string;
  role: string;
}

export interface UpdateUserInput {
  email?: string;
  role?: string;
}
