export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PressoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// 設定値の欠落・不正。起動時に致命的
export class ConfigurationError extends PressoError {}

// JWT トークンの取得失敗。クライアントは生成されない
export class AuthenticationError extends PressoError {}

export interface RemoteRequestDetails {
  operation: string;
  status?: number;
  url?: string;
  body?: string;
  cause?: unknown;
}

// 2xx 以外の応答・通信失敗・タイムアウト・AI サービスの失敗
export class RemoteRequestError extends PressoError {
  readonly operation: string;
  readonly status?: number;
  readonly url?: string;
  readonly body?: string;

  constructor(message: string, details: RemoteRequestDetails) {
    super(message, { cause: details.cause });
    this.operation = details.operation;
    this.status = details.status;
    this.url = details.url;
    this.body = details.body;
  }
}

// ローカルファイルの読み書き失敗
export class FileAccessError extends PressoError {
  readonly path: string;
  readonly code?: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.path = path;
    this.code = errnoCode(cause);
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
