/**
 * backend/src/modules/spond/spond.service.ts
 *
 * WHY:
 * - Entry point for the search-and-link endpoints and the three sync jobs.
 * - Only place in this module allowed to start transactions.
 *
 * RULES:
 * - Sync jobs fetch from Spond first and open the transaction after, so no
 *   transaction is held across network calls.
 * - Without an API client (no token) sync jobs return a skipped result.
 * - Search is rate limited per client IP.
 */

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { RateLimiter } from '../../shared/security/rate-limit';

import type { SpondApi } from './client/spond-api';
import { getNewestTransactionTime, searchSpondMembers } from './dal/spond.query-sql';
import type { SpondRepo } from './dal/spond.repo';
import { linkPlayerFlow, unlinkPlayerFlow } from './flows/link-player-flow';
import { syncEventsFlow } from './flows/sync-events-flow';
import { syncMembersFlow } from './flows/sync-members-flow';
import { syncTransactionsFlow } from './flows/sync-transactions-flow';
import { fetchTransactionPages } from './helpers/fetch-transaction-pages';
import { SPOND_SEARCH_LIMIT, SPOND_SEARCH_WINDOW_SECONDS, SPOND_TRANSACTIONS } from './spond.constants';
import type {
  LinkPlayerParams,
  MemberSearchResult,
  SyncEventsResult,
  SyncMembersResult,
  SyncSkipped,
  SyncTransactionsResult,
  UnlinkPlayerParams,
} from './spond.types';

const DAY_MS = 86_400_000;

const NO_TOKEN: SyncSkipped = { skipped: 'no_token', message: 'Spond API token missing; sync skipped.' };

export class SpondService {
  constructor(
    private readonly deps: {
      store: RecordStore;
      logger: Logger;
      auditRepo: AuditRepo;
      rateLimiter: RateLimiter;
      spondRepo: SpondRepo;
      spondApi: SpondApi | null;
      config: { eventsLookbackDays: number; eventsLookaheadDays: number; searchRateLimitPerMinute: number };
      now?: () => Date;
    },
  ) {}

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }

  async searchMembers(params: { q: string; ip: string }): Promise<{ results: MemberSearchResult[] }> {
    await this.deps.rateLimiter.hitOrThrow({
      key: `spond-search:ip:${params.ip}`,
      limit: this.deps.config.searchRateLimitPerMinute,
      windowSeconds: SPOND_SEARCH_WINDOW_SECONDS,
    });

    const members = await searchSpondMembers(this.deps.store, { term: params.q.trim(), limit: SPOND_SEARCH_LIMIT });
    return {
      results: members.map((m) => ({ id: m.id, spond_member_id: m.spond_member_id, name: m.full_name, email: m.email })),
    };
  }

  async linkPlayer(params: LinkPlayerParams): Promise<{ ok: true; link_id: string }> {
    const now = this.now();
    return this.deps.store.transaction((tx) => linkPlayerFlow({ ...this.deps, store: tx }, { ...params, now }));
  }

  async unlinkPlayer(params: UnlinkPlayerParams): Promise<{ ok: true }> {
    return this.deps.store.transaction((tx) => unlinkPlayerFlow({ ...this.deps, store: tx }, params));
  }

  async syncMembers(): Promise<SyncMembersResult | SyncSkipped> {
    const api = this.deps.spondApi;
    if (!api) return NO_TOKEN;

    const groups = await api.getGroups();
    const now = this.now();
    return this.deps.store.transaction((tx) => syncMembersFlow({ ...this.deps, store: tx }, { groups, now }));
  }

  async syncEvents(): Promise<SyncEventsResult | SyncSkipped> {
    const api = this.deps.spondApi;
    if (!api) return NO_TOKEN;

    const now = this.now();
    const start = new Date(now.getTime() - this.deps.config.eventsLookbackDays * DAY_MS);
    const end = new Date(now.getTime() + this.deps.config.eventsLookaheadDays * DAY_MS);

    const events = await api.getEvents({ start, end });
    return this.deps.store.transaction((tx) =>
      syncEventsFlow({ ...this.deps, store: tx }, { events, start, end, now }),
    );
  }

  async syncTransactions(): Promise<SyncTransactionsResult | SyncSkipped> {
    const api = this.deps.spondApi;
    if (!api) return NO_TOKEN;

    const now = this.now();
    const since =
      (await getNewestTransactionTime(this.deps.store)) ??
      new Date(now.getTime() - SPOND_TRANSACTIONS.initialLookbackDays * DAY_MS);

    const { transactions, pages } = await fetchTransactionPages(api, {
      since,
      until: now,
      pageSize: SPOND_TRANSACTIONS.pageSize,
      maxPages: SPOND_TRANSACTIONS.maxPages,
    });

    return this.deps.store.transaction((tx) =>
      syncTransactionsFlow({ ...this.deps, store: tx }, { transactions, pages }),
    );
  }
}
