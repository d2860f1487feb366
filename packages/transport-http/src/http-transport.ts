/**
 * HTTP transport
 *
 * Posts the encoded RequestEnvelope to the session's base URL and decodes the
 * ResponseEnvelope, optionally through one of a list of proxies.
 *
 * Response bodies are capped at 10MB. TLS certificates are always validated.
 */

import { fetch, ProxyAgent, type Dispatcher } from 'undici';
import { z } from 'zod';
import {
  codecFor,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '@questwire/protocol';
import { logger, ProtocolError, type ExchangeOptions, type Transport } from '@questwire/core';

const MAX_RESPONSE_SIZE = 10 * 1024 * 1024;

export const HttpTransportConfigSchema = z.object({
  /** Proxy URLs selected by `proxyId % proxies.length` */
  proxies: z.array(z.string().url()).default([]),
  timeout_ms: z.number().int().positive().default(30000),
  max_response_bytes: z.number().int().positive().default(MAX_RESPONSE_SIZE),
  user_agent: z.string().default('Niantic App'),
});

export type HttpTransportConfig = z.infer<typeof HttpTransportConfigSchema>;
export type HttpTransportConfigInput = z.input<typeof HttpTransportConfigSchema>;

const requestCodec = codecFor('RequestEnvelope');
const responseCodec = codecFor('ResponseEnvelope');

export class HttpTransport implements Transport {
  readonly id = 'http';
  private readonly config: HttpTransportConfig;
  private readonly agents = new Map<string, ProxyAgent>();

  constructor(config: HttpTransportConfigInput = {}) {
    const parsed = HttpTransportConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw ProtocolError.configuration(`Invalid HTTP transport config: ${issues}`, parsed.error);
    }
    this.config = parsed.data;
  }

  /**
   * Proxy URL used for `proxyId`, or undefined for a direct connection
   */
  proxyFor(proxyId: number): string | undefined {
    const { proxies } = this.config;
    if (proxyId < 0 || proxies.length === 0) {
      return undefined;
    }
    return proxies[proxyId % proxies.length];
  }

  async exchange(
    baseUrl: string,
    envelope: RequestEnvelope,
    options: ExchangeOptions
  ): Promise<ResponseEnvelope> {
    if (options.signal?.aborted) {
      throw ProtocolError.cancelled(options.signal.reason);
    }

    let body: Uint8Array;
    try {
      body = requestCodec.encode(envelope);
    } catch (error) {
      throw ProtocolError.formatting('Cannot encode request envelope', error);
    }

    const proxy = this.proxyFor(options.proxyId);
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeout_ms);
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const bytes = await this.post(baseUrl, body, controller.signal, proxy);
      try {
        return responseCodec.decode(bytes);
      } catch (error) {
        throw ProtocolError.response('Cannot decode response envelope', error);
      }
    } catch (error) {
      if (error instanceof ProtocolError) {
        throw error;
      }
      if (options.signal?.aborted) {
        throw ProtocolError.cancelled(error);
      }
      if (timedOut) {
        throw ProtocolError.request(`Request timed out after ${this.config.timeout_ms}ms`, error);
      }
      if (proxy !== undefined) {
        logger.warn(`[transport-http] Proxy ${options.proxyId} unreachable`);
        throw ProtocolError.proxyDead(options.proxyId, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw ProtocolError.request(`Request failed: ${reason}`, error);
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Close pooled proxy connections
   */
  async close(): Promise<void> {
    const agents = [...this.agents.values()];
    this.agents.clear();
    await Promise.all(agents.map(agent => agent.close()));
  }

  private dispatcherFor(proxy: string | undefined): Dispatcher | undefined {
    if (proxy === undefined) {
      return undefined;
    }
    let agent = this.agents.get(proxy);
    if (!agent) {
      agent = new ProxyAgent(proxy);
      this.agents.set(proxy, agent);
    }
    return agent;
  }

  private async post(
    url: string,
    body: Uint8Array,
    signal: AbortSignal,
    proxy: string | undefined
  ): Promise<Uint8Array> {
    logger.debug(`[transport-http] POST ${url} (${body.length} bytes, proxy=${proxy !== undefined})`);

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-protobuf',
        'User-Agent': this.config.user_agent,
      },
      body,
      signal,
      dispatcher: this.dispatcherFor(proxy),
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw ProtocolError.request(`HTTP ${response.status}: ${response.statusText}`);
    }

    const reader = response.body?.getReader();
    if (!reader) {
      return new Uint8Array();
    }

    const chunks: Uint8Array[] = [];
    let totalSize = 0;

    // eslint-disable-next-line no-constant-condition
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      totalSize += value.length;
      if (totalSize > this.config.max_response_bytes) {
        await reader.cancel();
        throw ProtocolError.request(
          `Response exceeded ${this.config.max_response_bytes} bytes`
        );
      }

      chunks.push(value);
    }

    return Buffer.concat(chunks);
  }
}
