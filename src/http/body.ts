import { Readable } from 'stream';
import { Params } from '../dispatcher';
import { MalformedInputError, RelayError } from '../types';

export const MAX_BODY_BYTES = 1024 * 1024;

export class PayloadTooLargeError extends RelayError {
  constructor(limit: number) {
    super('PAYLOAD_TOO_LARGE', `Request body exceeds ${limit} bytes`, { limit });
    this.name = 'PayloadTooLargeError';
  }
}

export async function readBody(request: Readable, limit = MAX_BODY_BYTES): Promise<Buffer> {
  return await new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    request.on('data', (chunk: Buffer | string) => {
      if (tooLarge) {
        return;
      }
      const value = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      size += value.byteLength;
      if (size > limit) {
        tooLarge = true;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(value);
    });

    request.on('error', reject);
    request.on('end', () => resolve(Buffer.concat(chunks)));
  });
}

// Form values arrive as strings; numbers and booleans are restored.
export function autoType(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) {
    return Number(value);
  }
  return value;
}

export function parseFormEncoded(text: string): Params {
  const params: Params = {};
  for (const [key, value] of new URLSearchParams(text)) {
    params[key] = autoType(value);
  }
  return params;
}

function isParams(value: unknown): value is Params {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a request body as a JSON object or as `key=value&...` pairs. The
 * content type decides when it is given; otherwise a leading `{` means JSON.
 */
export function parseBody(raw: Buffer, contentType?: string): Params {
  const text = raw.toString('utf8').trim();
  if (!text) {
    return {};
  }

  const type = (contentType ?? '').toLowerCase();
  const looksJson = type.includes('json') || (!type.includes('form') && text.startsWith('{'));
  if (!looksJson) {
    return parseFormEncoded(text);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedInputError(
      `Invalid JSON body: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!isParams(parsed)) {
    throw new MalformedInputError('JSON body must be an object');
  }
  return parsed;
}
