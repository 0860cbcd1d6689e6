/**
 * Overpass API client
 * POSTs a QL query with failover across interpreter mirrors.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { OVERPASS_FAILOVER_DELAY_MS, OVERPASS_RETRYABLE_STATUSES } from '../../config/index.js';
import { withDeadline, sleep, isTimeoutError } from '../../lib/reliability/timeout-guard.js';
import { PoiSourceError, errorMessage } from '../../lib/errors/analysis-errors.js';

/**
 * Envelope only; elements stay `unknown` so one malformed element
 * can be skipped by the extractor instead of rejecting the whole batch.
 * `remark` carries server-side failures reported with HTTP 200.
 */
const OverpassResponseSchema = z.object({
  elements: z.array(z.unknown()),
  remark: z.string().optional()
});

export type OverpassResponse = z.infer<typeof OverpassResponseSchema>;

/** Status-only for non-OK replies; the body is read only on success. */
type OverpassReply = { ok: false; status: number } | { ok: true; status: number; body: unknown };

export interface OverpassClientOptions {
  endpoints: string[];
  timeoutMs: number;
  userAgent: string;
  logger: Logger;
  fetchImpl?: typeof fetch;
  failoverDelayMs?: number;
}

export class OverpassClient {
  private readonly fetchImpl: typeof fetch;
  private readonly failoverDelayMs: number;

  constructor(private readonly options: OverpassClientOptions) {
    if (options.endpoints.length === 0) {
      throw new Error('OverpassClient requires at least one endpoint');
    }
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.failoverDelayMs = options.failoverDelayMs ?? OVERPASS_FAILOVER_DELAY_MS;
  }

  /**
   * Run a query, trying each endpoint in order.
   * Overload statuses, transport errors and timeouts fail over; other HTTP errors,
   * unparseable bodies and runtime-error remarks abort immediately.
   *
   * @throws PoiSourceError when no endpoint produced a usable response
   */
  async query(ql: string): Promise<OverpassResponse> {
    const { endpoints, logger } = this.options;
    let lastErr: unknown = null;

    for (let i = 0; i < endpoints.length; i++) {
      const endpoint = endpoints[i];
      const attempt = i + 1;
      logger.debug({ event: 'overpass_attempt', endpoint, attempt, of: endpoints.length }, '[Overpass] Querying');

      let reply: OverpassReply;
      try {
        reply = await this.post(endpoint, ql);
      } catch (err) {
        if (err instanceof PoiSourceError) throw err;
        lastErr = err;
        logger.warn(
          { event: isTimeoutError(err) ? 'overpass_timeout' : 'overpass_endpoint_failed', endpoint, error: errorMessage(err) },
          '[Overpass] Endpoint failed'
        );
        if (attempt < endpoints.length) await sleep(this.failoverDelayMs);
        continue;
      }

      if (OVERPASS_RETRYABLE_STATUSES.has(reply.status)) {
        lastErr = new Error(`Overpass HTTP ${reply.status} (overloaded) @ ${endpoint}`);
        logger.warn({ event: 'overpass_overloaded', endpoint, status: reply.status }, '[Overpass] Endpoint overloaded');
        if (attempt < endpoints.length) await sleep(this.failoverDelayMs);
        continue;
      }

      if (!reply.ok) {
        throw new PoiSourceError(`POI source query failed: Overpass HTTP ${reply.status}`);
      }

      const parsed = OverpassResponseSchema.safeParse(reply.body);
      if (!parsed.success) {
        throw new PoiSourceError('POI source returned an unexpected payload');
      }

      const { remark } = parsed.data;
      if (remark?.startsWith('runtime error')) {
        throw new PoiSourceError(`POI source query failed: ${remark}`);
      }

      logger.info(
        { event: 'overpass_ok', endpoint, attempt, elements: parsed.data.elements.length },
        '[Overpass] Query succeeded'
      );
      return parsed.data;
    }

    throw new PoiSourceError(`POI source query failed on all endpoints: ${errorMessage(lastErr)}`, {
      cause: lastErr
    });
  }

  /** The deadline covers the body read as well as the headers. */
  private post(endpoint: string, ql: string): Promise<OverpassReply> {
    return withDeadline(
      async signal => {
        const res = await this.fetchImpl(endpoint, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8',
            Accept: 'application/json',
            'User-Agent': this.options.userAgent
          },
          body: new URLSearchParams({ data: ql }).toString(),
          signal
        });
        if (!res.ok) return { ok: false, status: res.status };

        let body: unknown;
        try {
          body = await res.json();
        } catch (err) {
          throw new PoiSourceError('POI source returned an unparseable body', { cause: err });
        }
        return { ok: true, status: res.status, body };
      },
      this.options.timeoutMs,
      `Overpass ${endpoint}`
    );
  }
}
