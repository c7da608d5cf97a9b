/**
 * backend/src/modules/spond/helpers/spond-payload.ts
 *
 * WHY:
 * - Spond payloads drift: ids arrive as `id` or `uuid`, names under several keys,
 *   child groups as objects or bare ids, timestamps as ISO strings or epochs.
 * - Everything that reads a raw payload lives here, so the flows only see the
 *   normalized shapes below.
 */

import type { JsonObject, JsonValue } from '../../../shared/db/schema';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Strings as is, finite numbers as their decimal text; anything else is null. */
export function readString(obj: JsonObject, key: string): string | null {
  const value = obj[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function readObject(obj: JsonObject, key: string): JsonObject | null {
  const value = obj[key];
  return isJsonObject(value) ? value : null;
}

function readArray(obj: JsonObject, key: string): JsonValue[] {
  const value = obj[key];
  return Array.isArray(value) ? value : [];
}

/** First non-empty string among `keys`. */
function firstString(obj: JsonObject, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = readString(obj, key);
    if (value) return value;
  }
  return null;
}

export function remoteId(obj: JsonObject): string | null {
  return firstString(obj, ['id', 'uuid']);
}

/** Epoch numbers above 1e12 are milliseconds, smaller ones seconds. */
export function parseRemoteDate(value: JsonValue | undefined): Date | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return new Date(value > 1e12 ? value : value * 1000);
  }
  if (typeof value === 'string' && value.trim()) {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

function firstDate(obj: JsonObject, keys: readonly string[]): Date | null {
  for (const key of keys) {
    const date = parseRemoteDate(obj[key]);
    if (date) return date;
  }
  return null;
}

// ── Groups ─────────────────────────────────────────────────────

export type IndexedGroup = {
  name: string;
  parentId: string | null;
  raw: JsonObject;
};

function childGroups(group: JsonObject): JsonValue[] {
  const subGroups = readArray(group, 'subGroups');
  return subGroups.length ? subGroups : readArray(group, 'children');
}

/**
 * Flattens the group tree into spond group id -> group. A child given only by id
 * gets a placeholder (empty name) unless the id is already indexed.
 */
export function buildGroupIndex(groups: readonly JsonObject[]): Map<string, IndexedGroup> {
  const index = new Map<string, IndexedGroup>();

  const add = (group: JsonObject, parentId: string | null): void => {
    const id = remoteId(group);
    if (!id) return;

    index.set(id, { name: firstString(group, ['name', 'title']) ?? '', parentId, raw: group });

    for (const child of childGroups(group)) {
      if (isJsonObject(child)) {
        add(child, id);
      } else if (typeof child === 'string' || typeof child === 'number') {
        const childId = String(child);
        if (!index.has(childId)) index.set(childId, { name: '', parentId: id, raw: { id: childId } });
      }
    }
  };

  for (const group of groups) add(group, null);
  return index;
}

// ── Members ────────────────────────────────────────────────────

export type NormalizedMember = {
  spondMemberId: string;
  fullName: string;
  email: string;
  subGroupIds: string[];
  raw: JsonObject;
};

export function normalizeMember(member: JsonObject): NormalizedMember | null {
  const spondMemberId = remoteId(member);
  if (!spondMemberId) return null;

  const profile = readObject(member, 'profile') ?? {};
  const first = (firstString(member, ['firstName']) ?? firstString(profile, ['firstName']) ?? '').trim();
  const last = (firstString(member, ['lastName']) ?? firstString(profile, ['lastName']) ?? '').trim();

  const fullName =
    [first, last].filter(Boolean).join(' ') ||
    firstString(member, ['name', 'fullName']) ||
    firstString(profile, ['name']) ||
    '';
  const email = (firstString(member, ['email']) ?? firstString(profile, ['email']) ?? '').toLowerCase();

  const subGroupIds = readArray(member, 'subGroups').flatMap((id) =>
    typeof id === 'string' || typeof id === 'number' ? [String(id)] : [],
  );

  return { spondMemberId, fullName, email, subGroupIds, raw: member };
}

/** Members listed under the top-level groups, one entry per member id (last listing wins). */
export function collectMembers(groups: readonly JsonObject[]): NormalizedMember[] {
  const byId = new Map<string, NormalizedMember>();
  for (const group of groups) {
    for (const entry of readArray(group, 'members')) {
      if (!isJsonObject(entry)) continue;
      const member = normalizeMember(entry);
      if (member) byId.set(member.spondMemberId, member);
    }
  }
  return [...byId.values()];
}

// ── Events ─────────────────────────────────────────────────────

export type NormalizedEvent = {
  spondEventId: string;
  title: string;
  spondGroupId: string | null;
  startAt: Date | null;
  endAt: Date | null;
  raw: JsonObject;
};

export function normalizeEvent(event: JsonObject): NormalizedEvent | null {
  const spondEventId = remoteId(event);
  if (!spondEventId) return null;

  const time = readObject(event, 'time') ?? {};
  const group = readObject(event, 'group');
  const recipientsGroup = readObject(readObject(event, 'recipients') ?? {}, 'group');

  return {
    spondEventId,
    title: firstString(event, ['heading', 'title', 'name']) ?? '',
    spondGroupId:
      firstString(event, ['groupId']) ??
      (group ? remoteId(group) : null) ??
      (recipientsGroup ? remoteId(recipientsGroup) : null),
    startAt: firstDate(event, ['startTimestamp', 'startTime', 'start']) ?? firstDate(time, ['start']),
    endAt: firstDate(event, ['endTimestamp', 'endTime', 'end']) ?? firstDate(time, ['end']),
    raw: event,
  };
}

/**
 * Overlap test against [start, end]. Events without any time are kept; an open
 * end or open start only has to fall on the right side of the window.
 */
export function eventInRange(event: Pick<NormalizedEvent, 'startAt' | 'endAt'>, start: Date, end: Date): boolean {
  const s = event.startAt?.getTime() ?? null;
  const e = event.endAt?.getTime() ?? null;

  if (s === null && e === null) return true;
  if (e === null) return s !== null && s <= end.getTime();
  if (s === null) return e >= start.getTime();
  return !(e < start.getTime() || s > end.getTime());
}

// ── Transactions ───────────────────────────────────────────────

export type NormalizedTransaction = {
  spondTransactionId: string;
  spondMemberId: string | null;
  amount: string | null;
  currency: string;
  status: string;
  createdAt: Date | null;
  raw: JsonObject;
};

function toAmount(value: JsonValue | undefined): string | null {
  const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN;
  return Number.isFinite(n) ? n.toFixed(2) : null;
}

export function normalizeTransaction(txn: JsonObject): NormalizedTransaction | null {
  const spondTransactionId = remoteId(txn);
  if (!spondTransactionId) return null;

  return {
    spondTransactionId,
    spondMemberId: firstString(txn, ['memberId', 'member_id']),
    amount: toAmount(txn.amount),
    currency: firstString(txn, ['currency']) ?? 'GBP',
    status: firstString(txn, ['status']) ?? '',
    createdAt: firstDate(txn, ['createdTime', 'created_at', 'created', 'timestamp']),
    raw: txn,
  };
}
