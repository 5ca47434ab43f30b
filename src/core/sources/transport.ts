/**
 * HTTP transport used by the remote feed fetchers.
 *
 * Uses native Node.js fetch with an AbortController timeout. Status codes are
 * returned to the caller for `getText` so fetchers can react to 404s; network
 * failures and timeouts surface as SourceError.
 */

import { SourceError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface TransportResponse {
  status: number;
  ok: boolean;
  body: string;
}

export interface RemoteTransport {
  getText(url: string): Promise<TransportResponse>;
  getBytes(url: string): Promise<Uint8Array>;
}

export interface FetchTransportOptions {
  sourceName: string;
  username?: string;
  password?: string;
  timeoutMs: number;
  accept?: string;
}

export const USER_AGENT = 'nuforge/0.1.0';

/**
 * Headers for a feed request. Never log the result: it may carry credentials.
 */
export function buildRequestHeaders(options: FetchTransportOptions): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: options.accept ?? 'application/json, application/atom+xml, application/xml',
    'User-Agent': USER_AGENT
  };
  if (options.username && options.password) {
    const encoded = Buffer.from(`${options.username}:${options.password}`).toString('base64');
    headers.Authorization = `Basic ${encoded}`;
  } else if (options.password) {
    headers.Authorization = `Bearer ${options.password}`;
  }
  return headers;
}

export function createFetchTransport(options: FetchTransportOptions): RemoteTransport {
  const headers = buildRequestHeaders(options);

  async function request(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
    try {
      logger.debug(`GET ${url}`);
      return await fetch(url, { headers, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new SourceError(options.sourceName, `request timed out after ${options.timeoutMs}ms`, { url });
      }
      throw new SourceError(options.sourceName, `request failed: ${errorMessage(error)}`, { url });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  return {
    async getText(url: string): Promise<TransportResponse> {
      const response = await request(url);
      if (response.status === 401 || response.status === 403) {
        throw new SourceError(options.sourceName, `authentication required (${response.status})`, { url });
      }
      return { status: response.status, ok: response.ok, body: await response.text() };
    },

    async getBytes(url: string): Promise<Uint8Array> {
      const response = await request(url);
      if (!response.ok) {
        throw new SourceError(options.sourceName, `download failed with ${response.status} ${response.statusText}`, {
          url
        });
      }
      return new Uint8Array(await response.arrayBuffer());
    }
  };
}

/**
 * GET a JSON document, throwing SourceError on HTTP errors or invalid JSON.
 */
export async function getJson(transport: RemoteTransport, sourceName: string, url: string): Promise<unknown> {
  const response = await transport.getText(url);
  if (!response.ok) {
    throw new SourceError(sourceName, `GET ${url} returned ${response.status}`, { url, status: response.status });
  }
  try {
    return JSON.parse(response.body);
  } catch (error) {
    throw new SourceError(sourceName, `invalid JSON from ${url}: ${errorMessage(error)}`, { url });
  }
}
