import type { JsonObject } from '../../src/shared/db/schema';
import { buildTestDeps, TEST_NOW } from '../helpers/build-test-app';
import { FakeSpondApi } from '../helpers/fake-spond-api';
import { addPlayer, addPlayerType, addSpondMember } from '../helpers/fixtures';

async function setup() {
  const api = new FakeSpondApi();
  const built = await buildTestDeps({ spondApi: api });
  return { ...built, api, spond: built.deps.spond.spondService };
}

describe('spond member sync', () => {
  function clubGroups(ada: { subGroups: string[] }): JsonObject[] {
    return [
      {
        id: 'g1',
        name: 'Seniors',
        subGroups: [{ id: 'g2', name: 'First XV' }, 'g3'],
        members: [
          { id: 'm1', firstName: 'Ada', lastName: 'Lovelace', email: 'ADA@Example.test', subGroups: ada.subGroups },
          { id: 'm2', profile: { name: 'Grace Hopper', email: 'grace@example.test' } },
          { name: 'No Id' },
        ],
      },
    ];
  }

  it('mirrors the group tree and members', async () => {
    const { api, store, spond } = await setup();
    api.groups = clubGroups({ subGroups: ['g2', 'gX'] });

    const result = await spond.syncMembers();

    expect(result).toEqual({ members: 2, groups: 3, message: 'Synced 2 members; groups indexed: 3' });

    const seniors = await store.findOne('spond_groups', { spond_group_id: 'g1' });
    const firstXv = await store.findOne('spond_groups', { spond_group_id: 'g2' });
    const placeholder = await store.findOne('spond_groups', { spond_group_id: 'g3' });
    expect(seniors).toMatchObject({ name: 'Seniors', parent_id: null });
    expect(firstXv).toMatchObject({ name: 'First XV', parent_id: seniors?.id });
    expect(placeholder).toMatchObject({ name: 'g3', parent_id: seniors?.id });

    const ada = await store.findOne('spond_members', { spond_member_id: 'm1' });
    const grace = await store.findOne('spond_members', { spond_member_id: 'm2' });
    expect(ada).toMatchObject({ full_name: 'Ada Lovelace', email: 'ada@example.test', last_synced_at: TEST_NOW });
    expect(grace).toMatchObject({ full_name: 'Grace Hopper', email: 'grace@example.test' });

    const memberships = await store.list('spond_member_groups', { where: { member_id: ada?.id ?? '' } });
    expect(memberships.map((m) => m.group_id)).toEqual([firstXv?.id]);
  });

  it('replaces group memberships on the next sync', async () => {
    const { api, store, spond } = await setup();
    api.groups = clubGroups({ subGroups: ['g2'] });
    await spond.syncMembers();

    api.groups = clubGroups({ subGroups: [] });
    await spond.syncMembers();

    expect(await store.count('spond_members')).toBe(2);
    expect(await store.count('spond_groups')).toBe(3);
    expect(await store.count('spond_member_groups')).toBe(0);
  });
});

describe('spond event sync', () => {
  const events: JsonObject[] = [
    {
      id: 'e1',
      heading: 'Training',
      groupId: 'g1',
      startTimestamp: '2025-06-17T18:00:00Z',
      endTimestamp: '2025-06-17T20:00:00Z',
    },
    { id: 'e2', heading: 'Old match', startTimestamp: '2025-01-01T14:00:00Z', endTimestamp: '2025-01-01T16:00:00Z' },
    { uuid: 'e3', title: 'Social' },
    { heading: 'No id' },
  ];

  it('asks for the window around now and keeps events that overlap it', async () => {
    const { api, store, spond } = await setup();
    const group = await store.insert('spond_groups', { spond_group_id: 'g1', name: 'Seniors', parent_id: null, data: {} });
    api.events = events;

    const result = await spond.syncEvents();

    expect(api.eventRanges.map((r) => [r.start.toISOString(), r.end.toISOString()])).toEqual([
      ['2025-06-08T08:00:00.000Z', '2025-08-14T08:00:00.000Z'],
    ]);
    expect(result).toEqual({
      created: 2,
      updated: 0,
      unchanged: 0,
      fetched: 4,
      message: 'Synced events: +2, updated 0, unchanged 0',
    });

    expect(await store.findOne('spond_events', { spond_event_id: 'e1' })).toMatchObject({
      title: 'Training',
      group_id: group.id,
      start_at: new Date('2025-06-17T18:00:00Z'),
      end_at: new Date('2025-06-17T20:00:00Z'),
    });
    expect(await store.findOne('spond_events', { spond_event_id: 'e2' })).toBeNull();
    expect(await store.findOne('spond_events', { spond_event_id: 'e3' })).toMatchObject({
      title: 'Social',
      group_id: null,
      start_at: null,
    });
  });

  it('reports unchanged and updated events on a re-sync', async () => {
    const { api, spond } = await setup();
    api.events = events;
    await spond.syncEvents();

    const again = await spond.syncEvents();
    expect(again).toMatchObject({ created: 0, updated: 0, unchanged: 2 });

    api.events = [{ ...events[0], heading: 'Training (moved)' }, events[2] ?? {}];
    const renamed = await spond.syncEvents();
    expect(renamed).toMatchObject({
      created: 0,
      updated: 1,
      unchanged: 1,
      message: 'Synced events: +0, updated 1, unchanged 1',
    });
  });
});

describe('spond transaction sync', () => {
  it('pages from thirty days back and resolves members', async () => {
    const { api, store, spond } = await setup();
    const member = await addSpondMember(store, { spondMemberId: 'm1', fullName: 'Ada Lovelace' });
    api.transactionPages = [
      {
        results: [
          { id: 't1', memberId: 'm1', amount: '25', status: 'paid', createdTime: '2025-06-01T10:00:00Z' },
          { id: 't2', memberId: 'ghost', amount: 12.5 },
        ],
        next: 'cursor-2',
      },
      {
        results: [{ uuid: 't3', amount: 5, status: 'paid', createdTime: '2025-06-14T10:00:00Z' }, { amount: 1 }],
        next: null,
      },
    ];

    const result = await spond.syncTransactions();

    expect(result).toEqual({
      created: 3,
      updated: 0,
      unchanged: 0,
      pages: 2,
      message: 'Synced transactions: +3, updated 0, unchanged 0',
    });
    expect(api.transactionCalls).toEqual([
      { since: new Date('2025-05-16T08:00:00.000Z'), until: TEST_NOW, page: 1, pageSize: 100 },
      { since: new Date('2025-05-16T08:00:00.000Z'), until: TEST_NOW, page: 2, pageSize: 100 },
    ]);

    expect(await store.findOne('spond_transactions', { spond_transaction_id: 't1' })).toMatchObject({
      member_id: member.id,
      amount: '25.00',
      currency: 'GBP',
      status: 'paid',
      created_at_remote: new Date('2025-06-01T10:00:00Z'),
    });
    expect(await store.findOne('spond_transactions', { spond_transaction_id: 't2' })).toMatchObject({
      member_id: null,
      amount: '12.50',
      status: '',
      created_at_remote: null,
    });
  });

  it('continues from the newest stored transaction', async () => {
    const { api, spond } = await setup();
    api.transactionPages = [
      {
        results: [
          { id: 't1', amount: '25', createdTime: '2025-06-01T10:00:00Z' },
          { id: 't2', amount: '5' },
          { id: 't3', amount: '5', createdTime: '2025-06-14T10:00:00Z' },
        ],
        next: null,
      },
    ];
    await spond.syncTransactions();

    api.transactionPages = [{ results: [{ id: 't1', amount: '30', createdTime: '2025-06-01T10:00:00Z' }], next: null }];
    const result = await spond.syncTransactions();

    expect(api.transactionCalls[1]?.since).toEqual(new Date('2025-06-14T10:00:00Z'));
    expect(result).toMatchObject({ created: 0, updated: 1, unchanged: 0, pages: 1 });
  });
});

describe('spond sync without a token', () => {
  it('skips every sync job', async () => {
    const { deps, store } = await buildTestDeps();
    const skipped = { skipped: 'no_token', message: 'Spond API token missing; sync skipped.' };

    expect(await deps.spond.spondService.syncMembers()).toEqual(skipped);
    expect(await deps.spond.spondService.syncEvents()).toEqual(skipped);
    expect(await deps.spond.spondService.syncTransactions()).toEqual(skipped);
    expect(await store.count('spond_members')).toBe(0);
  });
});

describe('spond member search', () => {
  it('matches name or e-mail without regard to case, ordered by name', async () => {
    const { store, spond } = await setup();
    const ada = await addSpondMember(store, { spondMemberId: 'm1', fullName: 'Ada Lovelace', email: 'ada@example.test' });
    await addSpondMember(store, { spondMemberId: 'm2', fullName: 'Grace Hopper', email: 'grace@example.test' });
    const cara = await addSpondMember(store, { spondMemberId: 'm3', fullName: 'Cara Lovell', email: '' });

    const result = await spond.searchMembers({ q: '  LOVE ', ip: '127.0.0.1' });

    expect(result).toEqual({
      results: [
        { id: ada.id, spond_member_id: 'm1', name: 'Ada Lovelace', email: 'ada@example.test' },
        { id: cara.id, spond_member_id: 'm3', name: 'Cara Lovell', email: '' },
      ],
    });

    const byEmail = await spond.searchMembers({ q: 'grace@', ip: '127.0.0.1' });
    expect(byEmail.results.map((r) => r.spond_member_id)).toEqual(['m2']);
  });

  it('returns at most 25 members', async () => {
    const { store, spond } = await setup();
    for (let i = 10; i < 40; i += 1) {
      await addSpondMember(store, { spondMemberId: `m${i}`, fullName: `Member ${i}` });
    }

    const result = await spond.searchMembers({ q: 'member', ip: '127.0.0.1' });

    expect(result.results).toHaveLength(25);
    expect(result.results[0]?.name).toBe('Member 10');
    expect(result.results[24]?.name).toBe('Member 34');
  });
});

describe('spond player links', () => {
  async function linkSetup() {
    const built = await setup();
    const type = await addPlayerType(built.store, 'Senior');
    const player = await addPlayer(built.store, { publicId: 'P-1', playerTypeId: type.id });
    const member = await addSpondMember(built.store, { spondMemberId: 'm1', fullName: 'Ada Lovelace' });
    return { ...built, player, member };
  }

  it('links a player and audits it', async () => {
    const { store, spond, player, member } = await linkSetup();

    const result = await spond.linkPlayer({ playerId: player.id, spondMemberPk: member.id, requestId: 'req-1' });

    const link = await store.findOne('player_spond_links', { player_id: player.id });
    expect(result).toEqual({ ok: true, link_id: link?.id });
    expect(link).toMatchObject({ spond_member_id: member.id, active: true, linked_at: TEST_NOW });

    const audits = await store.list('audit_events', { where: { action: 'spond.link.created' } });
    expect(audits.map((a) => [a.request_id, a.metadata])).toEqual([
      ['req-1', { playerId: player.id, spondMemberId: 'm1', linkId: link?.id }],
    ]);
  });

  it('re-activates the same link instead of creating another', async () => {
    const { store, spond, player, member } = await linkSetup();

    const first = await spond.linkPlayer({ playerId: player.id, spondMemberPk: member.id, requestId: 'req-1' });
    const second = await spond.linkPlayer({ playerId: player.id, spondMemberPk: member.id, requestId: 'req-2' });
    expect(second.link_id).toBe(first.link_id);

    await spond.unlinkPlayer({ playerId: player.id, linkId: first.link_id, requestId: 'req-3' });
    expect(await store.findOne('player_spond_links', { id: first.link_id })).toMatchObject({ active: false });

    const third = await spond.linkPlayer({ playerId: player.id, spondMemberPk: member.id, requestId: 'req-4' });
    expect(third.link_id).toBe(first.link_id);
    expect(await store.count('player_spond_links')).toBe(1);
    expect(await store.findOne('player_spond_links', { id: first.link_id })).toMatchObject({ active: true });
  });

  it('audits an unlink', async () => {
    const { store, spond, player, member } = await linkSetup();
    const { link_id } = await spond.linkPlayer({ playerId: player.id, spondMemberPk: member.id, requestId: 'req-1' });

    const result = await spond.unlinkPlayer({ playerId: player.id, linkId: link_id, requestId: 'req-2' });

    expect(result).toEqual({ ok: true });
    const audits = await store.list('audit_events', { where: { action: 'spond.link.deactivated' } });
    expect(audits.map((a) => [a.request_id, a.metadata])).toEqual([['req-2', { playerId: player.id, linkId: link_id }]]);
  });

  it('rejects unknown players, members and links', async () => {
    const { store, spond, player, member } = await linkSetup();
    const missing = '00000000-0000-4000-8000-000000000000';

    await expect(
      spond.linkPlayer({ playerId: missing, spondMemberPk: member.id, requestId: 'req-1' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', status: 400, message: 'Invalid player' });

    await expect(
      spond.linkPlayer({ playerId: player.id, spondMemberPk: missing, requestId: 'req-1' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', message: 'Invalid Spond member' });

    const { link_id } = await spond.linkPlayer({ playerId: player.id, spondMemberPk: member.id, requestId: 'req-1' });
    await expect(
      spond.unlinkPlayer({ playerId: missing, linkId: link_id, requestId: 'req-2' }),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', message: 'Invalid link' });

    expect(await store.count('audit_events')).toBe(1);
  });
});
