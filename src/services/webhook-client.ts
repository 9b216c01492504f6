/**
 * HTTP transport for webhook deliveries
 * Performs one POST with a hard timeout and classifies what came back
 */

export interface WebhookRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
  timeoutSeconds: number;
}

export type WebhookResponse =
  | { kind: 'response'; statusCode: number; body: string }
  | { kind: 'timeout'; message: string }
  | { kind: 'connection_error'; message: string }
  | { kind: 'request_error'; message: string };

export interface WebhookTransport {
  post(request: WebhookRequest): Promise<WebhookResponse>;
}

const MAX_DETAIL_LENGTH = 200;

// Only the start of a reply is ever recorded
export const MAX_RESPONSE_BYTES = 4096;

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Turn whatever fetch threw into a transport outcome
 */
export function classifyTransportError(error: unknown, timeoutSeconds: number): WebhookResponse {
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return { kind: 'timeout', message: `Request timeout after ${timeoutSeconds}s` };
  }

  const detail = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCode(cause) ?? errorCode(error);

  if (code === 'UND_ERR_HEADERS_TIMEOUT' || code === 'UND_ERR_BODY_TIMEOUT') {
    return { kind: 'timeout', message: `Request timeout after ${timeoutSeconds}s` };
  }

  if ((code && CONNECTION_ERROR_CODES.has(code)) || detail === 'fetch failed') {
    const causeMessage = cause instanceof Error ? cause.message : detail;
    return {
      kind: 'connection_error',
      message: `Connection error: ${causeMessage.slice(0, MAX_DETAIL_LENGTH)}`,
    };
  }

  return { kind: 'request_error', message: `Request error: ${detail.slice(0, MAX_DETAIL_LENGTH)}` };
}

/**
 * Read at most `maxBytes` of a response body, then cancel the rest of the stream
 */
export async function readBodyPrefix(
  response: Response,
  maxBytes: number = MAX_RESPONSE_BYTES
): Promise<string> {
  if (!response.body) {
    return '';
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;

  while (received < maxBytes) {
    const { done, value } = await reader.read();
    if (done) {
      return Buffer.concat(chunks).toString('utf8');
    }
    chunks.push(value);
    received += value.byteLength;
  }

  await reader.cancel();
  return Buffer.concat(chunks).subarray(0, maxBytes).toString('utf8');
}

/**
 * fetch-based transport
 */
export class WebhookClient implements WebhookTransport {
  async post(request: WebhookRequest): Promise<WebhookResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutSeconds * 1000);

    try {
      const response = await fetch(request.url, {
        method: 'POST',
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      // Reading the body stays under the same timeout
      const body = await readBodyPrefix(response);
      return { kind: 'response', statusCode: response.status, body };
    } catch (error) {
      return classifyTransportError(error, request.timeoutSeconds);
    } finally {
      clearTimeout(timeout);
    }
  }
}
