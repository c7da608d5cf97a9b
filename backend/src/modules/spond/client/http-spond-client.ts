/**
 * backend/src/modules/spond/client/http-spond-client.ts
 *
 * WHY:
 * - Production SpondApi over HTTPS with a bearer token.
 *
 * RULES:
 * - Anything but 200 is a SpondApiError carrying the status; the body is logged,
 *   never thrown.
 * - Responses must be JSON; list endpoints may answer with a bare array or with
 *   `{ results | items | data: [...] }`.
 * - The token never appears in logs or errors.
 */

import { z } from 'zod';

import type { Logger } from '../../../shared/logger/logger';
import { jsonObjectSchema, jsonValueSchema } from '../../../shared/db/json';
import type { JsonObject, JsonValue } from '../../../shared/db/schema';

import { SPOND_REQUEST_TIMEOUT_MS } from '../spond.constants';
import { SpondApiError, type SpondApi, type TransactionPage } from './spond-api';

const listEnvelopeSchema = z.union([
  z.array(jsonObjectSchema),
  z
    .object({
      results: z.array(jsonObjectSchema).optional(),
      items: z.array(jsonObjectSchema).optional(),
      data: z.array(jsonObjectSchema).optional(),
      next: z.string().nullish(),
    })
    .passthrough(),
]);

type ListEnvelope = z.infer<typeof listEnvelopeSchema>;

function itemsOf(envelope: ListEnvelope): JsonObject[] {
  if (Array.isArray(envelope)) return envelope;
  return envelope.results ?? envelope.items ?? envelope.data ?? [];
}

export type HttpSpondClientOptions = {
  apiBase: string;
  apiToken: string;
  logger: Logger;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export class HttpSpondClient implements SpondApi {
  private readonly base: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: HttpSpondClientOptions) {
    this.base = opts.apiBase.replace(/\/+$/, '');
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private async getJson(path: string, query: Record<string, string> = {}): Promise<JsonValue> {
    const url = new URL(`${this.base}${path}`);
    for (const [key, value] of Object.entries(query)) url.searchParams.set(key, value);

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${this.opts.apiToken}`,
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? SPOND_REQUEST_TIMEOUT_MS),
      });
    } catch (err) {
      throw new SpondApiError(
        `Spond request to ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
        null,
        path,
      );
    }

    if (res.status !== 200) {
      const body = await res.text().catch(() => '');
      this.opts.logger.error({ msg: 'spond.api.error', path, status: res.status, body: body.slice(0, 500) });
      throw new SpondApiError(`Spond request to ${path} failed: ${res.status}`, res.status, path);
    }

    let raw: unknown;
    try {
      raw = await res.json();
    } catch {
      throw new SpondApiError(`Spond response from ${path} is not JSON`, res.status, path);
    }

    const parsed = jsonValueSchema.safeParse(raw);
    if (!parsed.success) throw new SpondApiError(`Spond response from ${path} is not JSON`, res.status, path);
    return parsed.data;
  }

  private async getList(path: string, query?: Record<string, string>): Promise<ListEnvelope> {
    const parsed = listEnvelopeSchema.safeParse(await this.getJson(path, query));
    if (!parsed.success) {
      throw new SpondApiError(`Spond response from ${path} is not a list`, 200, path);
    }
    return parsed.data;
  }

  async getGroups(): Promise<JsonObject[]> {
    return itemsOf(await this.getList('/groups'));
  }

  async getEvents(range: { start: Date; end: Date }): Promise<JsonObject[]> {
    return itemsOf(await this.getList('/events', { start: range.start.toISOString(), end: range.end.toISOString() }));
  }

  async listTransactions(params: {
    since?: Date;
    until?: Date;
    page: number;
    pageSize: number;
  }): Promise<TransactionPage> {
    const query: Record<string, string> = { page: String(params.page), page_size: String(params.pageSize) };
    if (params.since) query.since = params.since.toISOString();
    if (params.until) query.until = params.until.toISOString();

    const envelope = await this.getList('/transactions', query);
    return {
      results: itemsOf(envelope),
      next: Array.isArray(envelope) ? null : (envelope.next ?? null),
    };
  }
}

/** Null when no token is configured: sync jobs then report themselves skipped. */
export function createSpondClient(opts: {
  apiBase: string;
  apiToken: string | null;
  logger: Logger;
  fetchImpl?: typeof fetch;
}): SpondApi | null {
  if (!opts.apiToken) return null;
  return new HttpSpondClient({ ...opts, apiToken: opts.apiToken });
}
