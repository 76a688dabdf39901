import type { Context } from 'hono';

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

function declaredLengthExceeds(c: Context, maxBytes: number): boolean {
  const parsed = Number.parseInt(c.req.header('content-length') ?? '', 10);
  return Number.isFinite(parsed) && parsed > maxBytes;
}

/**
 * Reads the request body as UTF-8, stopping as soon as `maxBytes` is passed.
 * Content-Length is checked first but not trusted.
 */
async function readBodyWithLimit(
  c: Context,
  maxBytes: number,
): Promise<{ ok: true; raw: string } | { ok: false; response: Response }> {
  if (declaredLengthExceeds(c, maxBytes)) {
    return { ok: false, response: tooLarge(c, maxBytes) };
  }

  const stream = c.req.raw.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let totalBytes = 0;
  let raw = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel().catch(() => undefined);
        return { ok: false, response: tooLarge(c, maxBytes) };
      }
      raw += decoder.decode(value, { stream: true });
    }
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }

  return { ok: true, raw: raw + decoder.decode() };
}

export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  const read = await readBodyWithLimit(c, maxBytes);
  if (!read.ok) return read;

  if (!read.raw.trim()) {
    return { ok: false, response: c.json({ error: 'Request body is required' }, 400) };
  }
  try {
    return { ok: true, data: JSON.parse(read.raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON' }, 400) };
  }
}
