import type * as http from 'node:http';
import { InvalidPayloadError, PayloadNotFoundError } from '../errors.js';

export const MAX_BODY_BYTES = 1024 * 1024;

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

// Render and configuration failures are server faults (500)
export function statusForError(error: unknown): number {
  if (error instanceof HttpError) return error.status;
  if (error instanceof InvalidPayloadError) return 400;
  if (error instanceof PayloadNotFoundError) return 404;
  return 500;
}

export function decodePathParam(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) {
      throw new HttpError(400, `Malformed path parameter: ${value}`);
    }
    throw error;
  }
}

/**
 * Read the whole request body. Oversized bodies are drained and rejected with
 * 413 so the connection stays usable.
 */
export function readBody(req: http.IncomingMessage, limit = MAX_BODY_BYTES): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (tooLarge) {
        reject(new HttpError(413, `Request body exceeds ${limit} bytes`));
      } else {
        resolve(Buffer.concat(chunks));
      }
    });
    req.on('error', reject);
  });
}

export async function readJsonBody(req: http.IncomingMessage, options: { optional?: boolean } = {}): Promise<unknown> {
  const body = await readBody(req);
  const text = body.toString('utf-8').trim();

  if (text === '') {
    if (options.optional) return {};
    throw new HttpError(400, 'Request body must be a JSON document');
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new HttpError(400, 'Malformed JSON body');
  }
}

export function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body, null, 2));
}

export function sendText(res: http.ServerResponse, status: number, text: string): void {
  res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(text);
}

export function sendBytes(
  res: http.ServerResponse,
  bytes: Uint8Array,
  contentType: string,
  options: { download?: string } = {}
): void {
  const headers: http.OutgoingHttpHeaders = {
    'Content-Type': contentType,
    'Content-Length': bytes.length,
  };
  if (options.download) {
    headers['Content-Disposition'] = `attachment; filename="${options.download}"`;
  }
  res.writeHead(200, headers);
  res.end(bytes);
}
