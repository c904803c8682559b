import axios from 'axios';
import type { IncomingHttpHeaders } from 'http';
import type { Readable } from 'stream';
import { UpstreamError } from '../errors.js';

export interface UpstreamClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export interface ForwardRequest {
  method: string;
  /** Path and query string, e.g. `/v1/chat/completions?x=1`. */
  path: string;
  headers: IncomingHttpHeaders;
  body: Buffer;
}

export interface UpstreamResponse {
  status: number;
  headers: Record<string, string | string[]>;
  body: Readable;
}

export interface UpstreamHealth {
  reachable: boolean;
  url: string;
  models: string[];
  error?: string;
}

const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-connection',
  'transfer-encoding',
  'upgrade',
]);

// Recomputed from the (possibly rewritten) body
const REQUEST_HEADERS_TO_DROP = new Set([...HOP_BY_HOP_HEADERS, 'host', 'content-length']);

export function forwardableRequestHeaders(headers: IncomingHttpHeaders, bodyLength: number): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || REQUEST_HEADERS_TO_DROP.has(key.toLowerCase())) continue;
    result[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  if (bodyLength > 0) {
    result['content-length'] = String(bodyLength);
  }
  return result;
}

export function relayableResponseHeaders(headers: Record<string, unknown>): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null || HOP_BY_HOP_HEADERS.has(key.toLowerCase())) continue;
    result[key] = Array.isArray(value) ? value.map(String) : String(value);
  }
  return result;
}

/**
 * Thin forwarding client for the Ollama server. Bodies travel as raw bytes
 * in both directions so streamed completions are relayed as they arrive.
 */
export class UpstreamClient {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: UpstreamClientOptions = {}) {
    this.baseUrl = (options.baseUrl || 'http://localhost:11434').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs || 600000;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Any HTTP status from Ollama is a valid response to relay; only a failure
   * to get a response at all is an error.
   *
   * @throws UpstreamError when the server cannot be reached
   */
  async forward(request: ForwardRequest): Promise<UpstreamResponse> {
    const url = `${this.baseUrl}${request.path}`;

    try {
      const response = await axios.request<Readable>({
        url,
        method: request.method,
        headers: forwardableRequestHeaders(request.headers, request.body.length),
        data: request.body.length > 0 ? request.body : undefined,
        responseType: 'stream',
        decompress: false,
        maxRedirects: 0,
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });

      return {
        status: response.status,
        headers: relayableResponseHeaders(response.headers),
        body: response.data,
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new UpstreamError(
          `Failed to reach Ollama at ${this.baseUrl}: ${error.message}`,
          this.baseUrl,
          error.code
        );
      }
      throw error;
    }
  }

  async healthCheck(): Promise<UpstreamHealth> {
    try {
      const response = await axios.get<{ models?: Array<{ name: string }> }>(
        `${this.baseUrl}/api/tags`,
        { timeout: 5000 }
      );
      const models = Array.isArray(response.data.models)
        ? response.data.models.map(model => model.name)
        : [];
      return { reachable: true, url: this.baseUrl, models };
    } catch (error) {
      return {
        reachable: false,
        url: this.baseUrl,
        models: [],
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
