import {
  buildGroupIndex,
  collectMembers,
  eventInRange,
  normalizeEvent,
  normalizeMember,
  normalizeTransaction,
  parseRemoteDate,
} from '../../../src/modules/spond/helpers/spond-payload';

describe('parseRemoteDate', () => {
  it('reads ISO strings and both epoch units', () => {
    expect(parseRemoteDate('2025-06-15T10:00:00Z')?.toISOString()).toBe('2025-06-15T10:00:00.000Z');
    expect(parseRemoteDate(1_750_000_000)?.toISOString()).toBe('2025-06-15T15:06:40.000Z');
    expect(parseRemoteDate(1_750_000_000_000)?.toISOString()).toBe('2025-06-15T15:06:40.000Z');
  });

  it('returns null for blanks and garbage', () => {
    expect(parseRemoteDate('  ')).toBeNull();
    expect(parseRemoteDate('not a date')).toBeNull();
    expect(parseRemoteDate(undefined)).toBeNull();
  });
});

describe('buildGroupIndex', () => {
  it('flattens nested groups and adds placeholders for bare child ids', () => {
    const index = buildGroupIndex([
      {
        id: 'g1',
        name: 'Seniors',
        subGroups: [{ uuid: 'g2', title: 'First XV' }, 'g3'],
      },
      { id: 'g4', name: 'Juniors', children: ['g2'] },
    ]);

    expect([...index.keys()]).toEqual(['g1', 'g2', 'g3', 'g4']);
    expect(index.get('g2')).toMatchObject({ name: 'First XV', parentId: 'g1' });
    expect(index.get('g3')).toEqual({ name: '', parentId: 'g1', raw: { id: 'g3' } });
  });
});

describe('normalizeMember', () => {
  it('builds the name from first and last name, falling back to the profile', () => {
    expect(
      normalizeMember({ id: 'm1', profile: { firstName: 'Ada', lastName: 'Lovelace', email: 'ADA@Example.test' } }),
    ).toMatchObject({ spondMemberId: 'm1', fullName: 'Ada Lovelace', email: 'ada@example.test' });
  });

  it('falls back to name fields and keeps sub-group ids as strings', () => {
    expect(normalizeMember({ uuid: 'm2', name: 'Grace Hopper', subGroups: ['g2', 7, { id: 'x' }] })).toMatchObject({
      spondMemberId: 'm2',
      fullName: 'Grace Hopper',
      email: '',
      subGroupIds: ['g2', '7'],
    });
  });

  it('drops members without an id', () => {
    expect(normalizeMember({ name: 'No Id' })).toBeNull();
  });
});

describe('collectMembers', () => {
  it('dedupes by member id with the last listing winning', () => {
    const members = collectMembers([
      { id: 'g1', members: [{ id: 'm1', name: 'Old Name' }, 'not-an-object'] },
      { id: 'g2', members: [{ id: 'm1', name: 'New Name' }, { id: 'm2', name: 'Other' }] },
    ]);

    expect(members.map((m) => [m.spondMemberId, m.fullName])).toEqual([
      ['m1', 'New Name'],
      ['m2', 'Other'],
    ]);
  });
});

describe('normalizeEvent', () => {
  it('reads the heading, group and timestamps', () => {
    const event = normalizeEvent({
      id: 'e1',
      heading: 'Training',
      recipients: { group: { id: 'g1' } },
      startTimestamp: '2025-06-16T18:00:00Z',
      time: { end: '2025-06-16T19:30:00Z' },
    });

    expect(event).toMatchObject({ spondEventId: 'e1', title: 'Training', spondGroupId: 'g1' });
    expect(event?.startAt?.toISOString()).toBe('2025-06-16T18:00:00.000Z');
    expect(event?.endAt?.toISOString()).toBe('2025-06-16T19:30:00.000Z');
  });
});

describe('eventInRange', () => {
  const start = new Date('2025-06-10T00:00:00Z');
  const end = new Date('2025-06-20T00:00:00Z');
  const d = (iso: string) => new Date(iso);

  it('keeps overlapping and timeless events', () => {
    expect(eventInRange({ startAt: d('2025-06-09T00:00:00Z'), endAt: d('2025-06-10T01:00:00Z') }, start, end)).toBe(
      true,
    );
    expect(eventInRange({ startAt: null, endAt: null }, start, end)).toBe(true);
    expect(eventInRange({ startAt: d('2025-06-19T00:00:00Z'), endAt: null }, start, end)).toBe(true);
    expect(eventInRange({ startAt: null, endAt: d('2025-06-11T00:00:00Z') }, start, end)).toBe(true);
  });

  it('drops events wholly outside the window', () => {
    expect(eventInRange({ startAt: d('2025-06-01T00:00:00Z'), endAt: d('2025-06-02T00:00:00Z') }, start, end)).toBe(
      false,
    );
    expect(eventInRange({ startAt: d('2025-06-21T00:00:00Z'), endAt: null }, start, end)).toBe(false);
  });
});

describe('normalizeTransaction', () => {
  it('formats the amount and defaults the currency', () => {
    expect(normalizeTransaction({ id: 't1', amount: '12.5', memberId: 'm1', status: 'PAID' })).toMatchObject({
      spondTransactionId: 't1',
      spondMemberId: 'm1',
      amount: '12.50',
      currency: 'GBP',
      status: 'PAID',
      createdAt: null,
    });
  });

  it('leaves an unusable amount as null', () => {
    expect(normalizeTransaction({ id: 't2', amount: 'n/a' })?.amount).toBeNull();
  });
});
