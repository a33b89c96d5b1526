import type { Metric } from '../types/exposition.ts';
import { ExpositionParseError } from './errors.ts';

export type CompatHeaders =
  | Headers
  | { get?: (name: string) => string | null | undefined }
  | Record<string, string | string[] | undefined>;

export interface IngestRequestLike {
  headers?: CompatHeaders;
  contentType?: string;
  body?: unknown;
  text?: () => Promise<string> | string;
  arrayBuffer?: () => Promise<ArrayBuffer> | ArrayBuffer;
}

export interface BodyOptions {
  /** Must be text/plain, with a UTF-8 charset if one is given. Absent means text/plain. */
  contentType?: string;
}

export type IngestResult =
  | { status: 200; message: string; metrics: Metric[] }
  | { status: 400 | 415; message: string; error?: ExpositionParseError };

/** The part of a built parser the ingest path needs. */
export interface TextParser {
  parse(text: string): Metric[];
}

export class UnsupportedContentTypeError extends Error {
  override readonly name: string = 'UnsupportedContentTypeError';

  constructor(readonly contentType: string) {
    super(`Unsupported content type: ${contentType}`);
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function decodeBody(body: string | Uint8Array, options?: BodyOptions): string {
  const contentType = options?.contentType;
  if (contentType !== undefined && !isTextContentType(contentType)) {
    throw new UnsupportedContentTypeError(contentType);
  }
  return typeof body === 'string' ? body : utf8.decode(body);
}

/** text/plain (any other parameters, charset utf-8 if present) or no content type at all. */
export function isTextContentType(contentType: string | undefined): boolean {
  if (contentType === undefined) return true;
  const [media = '', ...params] = contentType.split(';').map((part) => part.trim().toLowerCase());
  if (media !== '' && media !== 'text/plain') return false;
  return params.every((param) => {
    const [key, value = ''] = param.split('=').map((part) => part.trim());
    return key !== 'charset' || value.replace(/"/g, '') === 'utf-8';
  });
}

export async function ingestRequest(parser: TextParser, req: Request | IngestRequestLike): Promise<IngestResult> {
  const normalized = await normalizeRequest(req);

  let text: string;
  try {
    text = decodeBody(normalized.body, { contentType: normalized.contentType });
  } catch (err) {
    if (err instanceof UnsupportedContentTypeError) return { status: 415, message: err.message };
    if (err instanceof TypeError) return { status: 400, message: 'Body is not valid UTF-8' };
    throw err;
  }

  try {
    return { status: 200, message: 'OK', metrics: parser.parse(text) };
  } catch (err) {
    if (err instanceof ExpositionParseError) return { status: 400, message: err.message, error: err };
    throw err;
  }
}

interface NormalizedRequest {
  contentType: string | undefined;
  body: string | Uint8Array;
}

async function normalizeRequest(req: Request | IngestRequestLike): Promise<NormalizedRequest> {
  const contentType = req instanceof Request ? undefined : req.contentType;
  const headers = req.headers;
  const meta = { contentType: contentType ?? getHeader(headers, 'content-type') };

  if (req instanceof Request) {
    return { ...meta, body: new Uint8Array(await req.arrayBuffer()) };
  }

  if (typeof req.arrayBuffer === 'function') {
    return { ...meta, body: new Uint8Array(await req.arrayBuffer()) };
  }
  if (typeof req.text === 'function') {
    return { ...meta, body: await req.text() };
  }

  const body = req.body;
  if (typeof body === 'string') return { ...meta, body };
  if (body instanceof Uint8Array) return { ...meta, body };
  if (body instanceof ArrayBuffer) return { ...meta, body: new Uint8Array(body) };
  if (body === undefined || body === null) return { ...meta, body: '' };
  return { ...meta, body: String(body) };
}

function getHeader(headers: CompatHeaders | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  if (headers instanceof Headers) return headers.get(name) ?? undefined;
  if (typeof headers.get === 'function') return headers.get(name) ?? undefined;
  const record = headers as Record<string, string | string[] | undefined>;
  const key = Object.keys(record).find((k) => k.toLowerCase() === name);
  const value = key === undefined ? undefined : record[key];
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && value.length > 0) return value[0];
  return undefined;
}
