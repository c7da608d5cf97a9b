/**
 * frontend/src/spond-link/spond-api.ts
 *
 * WHY:
 * - The two requests the widget makes, with the server's answers validated by zod.
 *
 * RULES:
 * - searchMembers never rejects: non-2xx, network and parse failures give [].
 * - linkMember resolves true only for 200, 201 or 204.
 */

import { z } from 'zod';

import type { FetchLike, MemberResult } from './spond-link.types';

const memberResultSchema = z.object({
  id: z.string(),
  spond_member_id: z.string().default(''),
  name: z.string(),
  email: z
    .string()
    .nullish()
    .transform((v) => v ?? ''),
});

const searchResponseSchema = z.object({
  results: z.array(memberResultSchema).default([]),
});

const LINK_SUCCESS_STATUSES = new Set([200, 201, 204]);

export function searchUrl(query: string): string {
  return `/spond/search/?q=${encodeURIComponent(query)}`;
}

export function linkUrl(playerId: string): string {
  return `/spond/link/${encodeURIComponent(playerId)}/`;
}

export async function searchMembers(fetchImpl: FetchLike, query: string): Promise<MemberResult[]> {
  try {
    const res = await fetchImpl(searchUrl(query), { headers: { Accept: 'application/json' } });
    if (!res.ok) return [];

    const parsed = searchResponseSchema.safeParse(await res.json());
    return parsed.success ? parsed.data.results : [];
  } catch {
    return [];
  }
}

export async function linkMember(
  fetchImpl: FetchLike,
  params: { playerId: string; spondMemberPk: string; csrfToken: string | null },
): Promise<boolean> {
  const headers: Record<string, string> = { 'Content-Type': 'application/x-www-form-urlencoded' };
  if (params.csrfToken) headers['X-CSRFToken'] = params.csrfToken;

  try {
    const res = await fetchImpl(linkUrl(params.playerId), {
      method: 'POST',
      headers,
      body: new URLSearchParams({ spond_member_pk: params.spondMemberPk }).toString(),
      credentials: 'same-origin',
    });
    return LINK_SUCCESS_STATUSES.has(res.status);
  } catch {
    return false;
  }
}
