export type ErrorCode =
  | 'NETWORK'
  | 'HTTP'
  | 'NO_DATA'
  | 'BAD_PAYLOAD'
  | 'CONFIG'
  | 'UNKNOWN';

const KNOWN: readonly string[] = ['NETWORK', 'HTTP', 'NO_DATA', 'BAD_PAYLOAD', 'CONFIG', 'UNKNOWN'];

function isErrorCode(s: string): s is ErrorCode { return KNOWN.includes(s); }

export class FeedError extends Error {
  readonly code: ErrorCode;
  readonly symbol: string;
  readonly status?: number;

  constructor(code: ErrorCode, symbol: string, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'FeedError';
    this.code = code;
    this.symbol = symbol;
    this.status = options?.status;
  }
}

export class ConfigError extends Error {
  readonly code: ErrorCode = 'CONFIG';

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readCode(err: unknown): string {
  if (typeof err !== 'object' || err === null) return '';
  const own = 'code' in err ? err.code : undefined;
  if (own != null && own !== '') return String(own);
  const cause = 'cause' in err ? err.cause : undefined;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && cause.code != null) return String(cause.code);
  return '';
}

function readStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('response' in err)) return undefined;
  const res = err.response;
  if (typeof res === 'object' && res !== null && 'status' in res && typeof res.status === 'number') return res.status;
  return undefined;
}

export function normalizeErrorCode(err: unknown): ErrorCode {
  if (readStatus(err) !== undefined) return 'HTTP';
  const code = readCode(err).toUpperCase();
  if (!code) return 'UNKNOWN';
  if (isErrorCode(code)) return code;
  if (/ECONNRESET|ETIMEDOUT|ENETUNREACH|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|ECONNABORTED|ERR_NETWORK/.test(code)) return 'NETWORK';
  if (code === 'ERR_BAD_RESPONSE' || code === 'ERR_BAD_REQUEST') return 'HTTP';
  return 'UNKNOWN';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function buildErrorEventMeta(pair: string, err: unknown) {
  const code = normalizeErrorCode(err);
  return {
    pair,
    code,
    cause: { code, message: errorMessage(err), status: readStatus(err) ?? (err instanceof FeedError ? err.status : undefined) },
  };
}
