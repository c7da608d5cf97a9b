import { describe, it, expect, vi } from 'vitest';

import { linkMember, searchMembers } from '../src/spond-link/spond-api';
import { jsonResponse } from './helpers';

describe('searchMembers', () => {
  it('encodes the query and returns validated results', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ results: [{ id: 'm-1', spond_member_id: 'S1', name: 'Ann Lee', email: null }] }),
    );

    const results = await searchMembers(fetchImpl, 'ann lee');

    expect(fetchImpl).toHaveBeenCalledWith('/spond/search/?q=ann%20lee', { headers: { Accept: 'application/json' } });
    expect(results).toEqual([{ id: 'm-1', spond_member_id: 'S1', name: 'Ann Lee', email: '' }]);
  });

  it('returns [] for a non-2xx response', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ error: { code: 'RATE_LIMITED', message: 'Too many requests' } }, 429),
    );

    expect(await searchMembers(fetchImpl, 'ann')).toEqual([]);
  });

  it('returns [] when the request fails', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('Failed to fetch');
    });

    expect(await searchMembers(fetchImpl, 'ann')).toEqual([]);
  });

  it('returns [] for a body of the wrong shape', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ results: [{ id: 7 }] }));

    expect(await searchMembers(fetchImpl, 'ann')).toEqual([]);
  });
});

describe('linkMember', () => {
  it('posts the member id urlencoded with the CSRF header', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ ok: true, link_id: 'l-1' }));

    const ok = await linkMember(fetchImpl, { playerId: 'p-1', spondMemberPk: 'm-1', csrfToken: 'test-csrf' });

    expect(ok).toBe(true);
    expect(fetchImpl).toHaveBeenCalledWith('/spond/link/p-1/', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', 'X-CSRFToken': 'test-csrf' },
      body: 'spond_member_pk=m-1',
      credentials: 'same-origin',
    });
  });

  it('omits the CSRF header when there is no token', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response(null, { status: 204 }));

    const ok = await linkMember(fetchImpl, { playerId: 'p-1', spondMemberPk: 'm-1', csrfToken: null });

    expect(ok).toBe(true);
    expect(fetchImpl).toHaveBeenCalledWith('/spond/link/p-1/', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'spond_member_pk=m-1',
      credentials: 'same-origin',
    });
  });

  it('accepts 201 and rejects other statuses', async () => {
    const created = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({}, 201));
    const accepted = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({}, 202));
    const invalid = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ error: { code: 'VALIDATION_ERROR', message: 'Invalid player' } }, 400),
    );
    const params = { playerId: 'p-1', spondMemberPk: 'm-1', csrfToken: null };

    expect(await linkMember(created, params)).toBe(true);
    expect(await linkMember(accepted, params)).toBe(false);
    expect(await linkMember(invalid, params)).toBe(false);
  });

  it('returns false when the request fails', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('Failed to fetch');
    });

    expect(await linkMember(fetchImpl, { playerId: 'p-1', spondMemberPk: 'm-1', csrfToken: null })).toBe(false);
  });
});
