/**
 * Low-level JSON-RPC over HTTP POST
 *
 * @module transport/http/HttpRpcClient
 */

import { isRpcResponse, parseBatchResponse } from '../../rpc/envelope.js';
import type { RpcRequest, RpcResponse } from '../../rpc/types.js';
import { HttpRequestError, RpcError, RpcRequestError } from '../../utils/errors.js';
import { extractUrlCredentials, sanitizeUrl } from '../../utils/url.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpRequestContext {
  url: string;
  init: RequestInit;
}

export interface HttpRpcClientOptions {
  /** Extra headers sent with every POST */
  headers?: Record<string, string>;
  /** Replaces the global fetch */
  fetchFn?: FetchFn;
  /** Called before each POST; may mutate `init` */
  onRequest?: (context: HttpRequestContext) => void | Promise<void>;
  /** Called with each response before its body is read */
  onResponse?: (response: Response) => void | Promise<void>;
}

export class HttpRpcClient {
  /** Endpoint with any userinfo removed */
  readonly url: string;
  /** Endpoint safe for logs and errors */
  readonly sanitizedUrl: string;

  private readonly headers: Record<string, string>;
  private readonly fetchFn: FetchFn;
  private readonly options: HttpRpcClientOptions;

  constructor(url: string, options: HttpRpcClientOptions = {}) {
    const credentials = extractUrlCredentials(url);
    this.url = credentials.url;
    this.sanitizedUrl = sanitizeUrl(credentials.url);
    this.headers = {
      'Content-Type': 'application/json',
      ...options.headers,
      ...credentials.headers,
    };
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.options = options;
  }

  /**
   * POSTs a single request object
   * @throws HttpRequestError on transport failure or a malformed reply
   */
  async request(body: RpcRequest, signal?: AbortSignal): Promise<RpcResponse> {
    const reply = await this.post(body, signal);
    if (!isRpcResponse(reply)) {
      throw new HttpRequestError({ url: this.sanitizedUrl, body: reply, details: 'malformed JSON-RPC response' });
    }
    return reply;
  }

  /**
   * POSTs a JSON array of requests
   * @returns Well-formed responses in server order
   * @throws RpcRequestError when the server answers the whole batch with one error object
   */
  async batchRequest(bodies: RpcRequest[], signal?: AbortSignal): Promise<RpcResponse[]> {
    const reply = await this.post(bodies, signal);
    if (!Array.isArray(reply)) {
      if (isRpcResponse(reply) && reply.error) {
        throw new RpcRequestError(this.sanitizedUrl, bodies, new RpcError(reply.error));
      }
      throw new HttpRequestError({ url: this.sanitizedUrl, body: reply, details: 'batch reply is not an array' });
    }
    return parseBatchResponse(reply);
  }

  private async post(payload: RpcRequest | RpcRequest[], signal?: AbortSignal): Promise<unknown> {
    const init: RequestInit = {
      method: 'POST',
      headers: { ...this.headers },
      body: JSON.stringify(payload),
      signal,
    };
    await this.options.onRequest?.({ url: this.url, init });

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(this.url, init);
      await this.options.onResponse?.(response);
      text = await response.text();
    } catch (error) {
      throw new HttpRequestError({ url: this.sanitizedUrl, cause: error });
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    if (!response.ok) {
      throw new HttpRequestError({
        url: this.sanitizedUrl,
        status: response.status,
        statusText: response.statusText,
        body: parseOrText(text),
        headers,
      });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new HttpRequestError({
        url: this.sanitizedUrl,
        body: text,
        headers,
        cause: error,
        details: 'response body is not valid JSON',
      });
    }
  }
}

function parseOrText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
