import { buildTestDeps } from '../helpers/build-test-app';
import { addPlayer, addPlayerType } from '../helpers/fixtures';

async function setup() {
  const built = await buildTestDeps();
  const { store } = built;
  const type = await addPlayerType(store, 'Senior');

  const add = (publicId: string, month: string, membershipNumber: string | null) =>
    addPlayer(store, {
      publicId,
      playerTypeId: type.id,
      membershipNumber,
      createdAt: new Date(`2024-${month}-01T00:00:00.000Z`),
    });

  await add('P-4', '04', 'LEGACY-9');
  await add('P-2', '02', null);
  await add('P-1', '01', '00007');
  await add('P-3', '03', '');

  return { ...built, type, members: built.deps.members.memberService };
}

async function numbers(store: Awaited<ReturnType<typeof setup>>['store']) {
  const players = await store.list('players', { orderBy: [{ column: 'public_id' }] });
  return players.map((p) => [p.public_id, p.membership_number]);
}

describe('membership number backfill', () => {
  it('numbers players without one after the highest numeric number', async () => {
    const { store, members } = await setup();

    const result = await members.backfillMembershipNumbers({ digits: 5, force: false, dryRun: false });

    expect(result.written).toBe(true);
    expect(result.lines).toEqual(['Prepared 2 player(s) for update.', 'Updated 2 player(s).']);
    expect(await numbers(store)).toEqual([
      ['P-1', '00007'],
      ['P-2', '00008'],
      ['P-3', '00009'],
      ['P-4', 'LEGACY-9'],
    ]);

    const again = await members.backfillMembershipNumbers({ digits: 5, force: false, dryRun: false });
    expect(again).toEqual({ changes: [], written: false, lines: ['Nothing to update.'] });
  });

  it('lists planned numbers on a dry run and writes nothing', async () => {
    const { store, members } = await setup();

    const result = await members.backfillMembershipNumbers({ digits: 5, force: false, dryRun: true });

    expect(result.written).toBe(false);
    expect(result.lines).toEqual([
      'Prepared 2 player(s) for update.',
      '  public_id=P-2 -> membership_number=00008',
      '  public_id=P-3 -> membership_number=00009',
      'Dry run: no changes written.',
    ]);
    expect(await store.findOne('players', { public_id: 'P-2' })).toMatchObject({ membership_number: null });
  });

  it('renumbers everyone in registration order with --force', async () => {
    const { store, members } = await setup();
    await members.backfillMembershipNumbers({ digits: 5, force: false, dryRun: false });

    const result = await members.backfillMembershipNumbers({ digits: 3, force: true, dryRun: false });

    expect(result.changes.map((c) => [c.publicId, c.from, c.to])).toEqual([
      ['P-1', '00007', '001'],
      ['P-2', '00008', '002'],
      ['P-3', '00009', '003'],
      ['P-4', 'LEGACY-9', '004'],
    ]);
    expect(await numbers(store)).toEqual([
      ['P-1', '001'],
      ['P-2', '002'],
      ['P-3', '003'],
      ['P-4', '004'],
    ]);

    const again = await members.backfillMembershipNumbers({ digits: 3, force: true, dryRun: false });
    expect(again.lines).toEqual(['Nothing to update.']);
  });

  it('shows at most ten planned numbers on a dry run', async () => {
    const { store, type, members } = await setup();
    for (let i = 10; i < 20; i += 1) {
      await addPlayer(store, { publicId: `Q-${i}`, playerTypeId: type.id, createdAt: new Date(`2024-05-${i}T00:00:00Z`) });
    }

    const result = await members.backfillMembershipNumbers({ digits: 5, force: false, dryRun: true });

    expect(result.changes).toHaveLength(12);
    expect(result.lines).toHaveLength(13);
    expect(result.lines.slice(-3)).toEqual([
      '  public_id=Q-17 -> membership_number=00017',
      '  ... and 2 more',
      'Dry run: no changes written.',
    ]);
  });

  it('rejects a digit count outside 1 to 12', async () => {
    const { members } = await setup();

    await expect(members.backfillMembershipNumbers({ digits: 0, force: false, dryRun: false })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      message: '--digits must be a whole number between 1 and 12 (got 0)',
    });
  });
});
