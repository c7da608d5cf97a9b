import path from 'node:path';

import { buildTestDeps } from '../helpers/build-test-app';
import { addPlayer, addSeason } from '../helpers/fixtures';
import { makeTempDir, writeJson } from '../helpers/seed-files';

const SEASON = '2024/25';

function membershipsDoc(overrides: { teamMemberships?: unknown[]; productSeason?: string } = {}) {
  return {
    _meta: { version: 3 },
    memberships: {
      seasons: [{ name: SEASON, start: '2024-09-01', end: '2025-08-31', is_active: true }],
      categories: [{ code: 'senior', label: 'Senior', applies_to: ['Adult'] }],
      products: [
        {
          season: overrides.productSeason ?? SEASON,
          category: 'senior',
          sku: 'SNR-FULL',
          name: 'Senior full',
          price: 120,
          plans: [{ label: 'Monthly', instalment_amount_gbp: '12', instalment_count: 10 }],
        },
      ],
      addons: [{ season: SEASON, name: 'Kit', amount_gbp: 25 }],
      match_fees: [{ season: SEASON, name: 'Standard', amount_gbp: 8, category: 'senior' }],
    },
    members: {
      player_types: [{ name: 'Adult' }],
      positions: [{ name: 'Prop' }],
      question_categories: [{ name: 'Medical', sort_order: 2 }],
      dynamic_questions: [
        {
          code: 'allergies',
          text: 'Any allergies?',
          field_type: 'boolean',
          category: 'Medical',
          applies_to: ['Adult'],
          choices: ['yes', 'no'],
        },
      ],
      teams: [{ name: 'First XV' }],
      team_memberships: overrides.teamMemberships ?? [],
    },
  };
}

const ENTITIES = [
  'Season',
  'PlayerType',
  'MembershipCategory',
  'MembershipProduct',
  'PaymentPlan',
  'AddOnFee',
  'MatchFeeTariff',
  'Position',
  'QuestionCategory',
  'DynamicQuestion',
  'Team',
];

describe('seed_memberships import', () => {
  let tmp: Awaited<ReturnType<typeof makeTempDir>>;

  beforeEach(async () => {
    tmp = await makeTempDir();
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('creates every row on the first run and reports unchanged on the second', async () => {
    const { deps, store } = await buildTestDeps();
    const file = await writeJson(tmp.file('memberships.json'), membershipsDoc());
    const seeding = deps.seeding.seedingService;

    const first = await seeding.importMembershipsSeed({ path: file, dryRun: false, purge: false });
    expect(first.lines).toContain(`${'Season'.padEnd(20)} ${SEASON} -> created`);
    expect(first.lines).toContain(`${'PaymentPlan'.padEnd(20)} SNR-FULL -> Monthly -> created`);
    expect(first.lines).toContain(`${'MatchFeeTariff'.padEnd(20)} Standard (${SEASON}) [category:senior] -> created`);
    expect(first.lines.slice(-ENTITIES.length - 1)).toEqual([
      'Seeding complete.',
      ...ENTITIES.map((e) => `${e}: +1, updated 0, unchanged 0`),
    ]);

    const second = await seeding.importMembershipsSeed({ path: file, dryRun: false, purge: false });
    expect(second.lines.slice(-ENTITIES.length)).toEqual(ENTITIES.map((e) => `${e}: +0, updated 0, unchanged 1`));

    expect(await store.count('seasons')).toBe(1);
    expect(await store.count('membership_category_player_types')).toBe(1);
    expect(await store.count('audit_events', { action: 'seed.memberships.imported' })).toBe(2);
  });

  it('applies defaults and legacy field names', async () => {
    const { deps, store } = await buildTestDeps();
    const file = await writeJson(tmp.file('memberships.json'), membershipsDoc());
    await deps.seeding.seedingService.importMembershipsSeed({ path: file, dryRun: false, purge: false });

    const product = await store.findOne('membership_products', { sku: 'SNR-FULL' });
    expect(product).toMatchObject({ list_price_gbp: '120.00', requires_plan: true, pay_per_match: false, notes: '' });

    const plan = await store.findOne('payment_plans', { label: 'Monthly' });
    expect(plan).toMatchObject({ instalment_amount_gbp: '12.00', frequency: 'monthly', includes_match_fees: true });

    const question = await store.findOne('dynamic_questions', { code: 'allergies' });
    expect(question).toMatchObject({
      label: 'Any allergies?',
      question_type: 'boolean',
      choices_text: 'yes\nno',
    });

    const category = await store.findOne('question_categories', { name: 'Medical' });
    expect(category?.display_order).toBe(2);
  });

  it('rolls everything back on --dry-run but still reports the outcomes', async () => {
    const { deps, store } = await buildTestDeps();
    const file = await writeJson(tmp.file('memberships.json'), membershipsDoc());

    const result = await deps.seeding.seedingService.importMembershipsSeed({ path: file, dryRun: true, purge: false });

    expect(result.dryRun).toBe(true);
    expect(result.lines).toContain('Dry-run complete. Transaction rolled back.');
    expect(result.counts.Season).toEqual({ created: 1, updated: 0, unchanged: 0 });
    expect(await store.count('seasons')).toBe(0);
    expect(await store.count('audit_events')).toBe(0);
  });

  it('aborts the whole import on an unknown reference', async () => {
    const { deps, store } = await buildTestDeps();
    const file = await writeJson(tmp.file('memberships.json'), membershipsDoc({ productSeason: '2099/00' }));

    await expect(
      deps.seeding.seedingService.importMembershipsSeed({ path: file, dryRun: false, purge: false }),
    ).rejects.toThrow("Unknown Season '2099/00' for MembershipProduct SNR-FULL");

    expect(await store.count('seasons')).toBe(0);
    expect(await store.count('player_types')).toBe(0);
  });

  it('syncs team memberships and their positions against existing players', async () => {
    const { deps, store } = await buildTestDeps();
    const seeding = deps.seeding.seedingService;
    await seeding.importMembershipsSeed({
      path: await writeJson(tmp.file('base.json'), membershipsDoc()),
      dryRun: false,
      purge: false,
    });

    const adult = await store.findOne('player_types', { name: 'Adult' });
    await addPlayer(store, { publicId: 'p-1', playerTypeId: adult?.id ?? '' });

    const withPosition = await writeJson(
      tmp.file('with-position.json'),
      membershipsDoc({ teamMemberships: [{ team: 'First XV', player_public_id: 'p-1', positions: ['Prop'] }] }),
    );
    const key = 'First XV <- p-1';
    const line = (outcome: string) => `${'TeamMembership'.padEnd(20)} ${key} -> ${outcome}`;

    const created = await seeding.importMembershipsSeed({ path: withPosition, dryRun: false, purge: false });
    expect(created.lines).toContain(line('created'));

    const again = await seeding.importMembershipsSeed({ path: withPosition, dryRun: false, purge: false });
    expect(again.lines).toContain(line('unchanged'));

    const noPositions = await writeJson(
      tmp.file('no-positions.json'),
      membershipsDoc({ teamMemberships: [{ team: 'First XV', player_public_id: 'p-1', positions: [] }] }),
    );
    const updated = await seeding.importMembershipsSeed({ path: noPositions, dryRun: false, purge: false });
    expect(updated.lines).toContain(line('updated'));
    expect(await store.count('team_membership_positions')).toBe(0);
    expect(await store.count('team_memberships')).toBe(1);
  });

  it('refuses a team membership for a player that does not exist', async () => {
    const { deps } = await buildTestDeps();
    const file = await writeJson(
      tmp.file('memberships.json'),
      membershipsDoc({ teamMemberships: [{ team: 'First XV', player_public_id: 'ghost' }] }),
    );

    await expect(
      deps.seeding.seedingService.importMembershipsSeed({ path: file, dryRun: false, purge: false }),
    ).rejects.toThrow("Unknown Player 'ghost' for TeamMembership First XV <- ghost");
  });

  it('purges existing configuration before importing', async () => {
    const { deps, store } = await buildTestDeps();
    await addSeason(store, 'Old season');
    const file = await writeJson(tmp.file('memberships.json'), membershipsDoc());

    const result = await deps.seeding.seedingService.importMembershipsSeed({ path: file, dryRun: false, purge: true });

    expect(result.lines[0]).toBe('Purged 1 existing rows.');
    expect((await store.list('seasons')).map((s) => s.name)).toEqual([SEASON]);
  });

  it('refuses to purge while players exist', async () => {
    const { deps, store } = await buildTestDeps();
    await addPlayer(store, { publicId: 'p-1', playerTypeId: 'pt' });
    const file = await writeJson(tmp.file('memberships.json'), membershipsDoc());

    await expect(
      deps.seeding.seedingService.importMembershipsSeed({ path: file, dryRun: false, purge: true }),
    ).rejects.toMatchObject({
      code: 'CONFLICT',
      message: 'Refusing to purge while dependent rows exist (players=1)',
    });
  });

  it('fails before any write when the file is missing or invalid', async () => {
    const { deps } = await buildTestDeps();
    const missing = tmp.file('missing.json');

    await expect(
      deps.seeding.seedingService.importMembershipsSeed({ path: missing, dryRun: false, purge: false }),
    ).rejects.toThrow(`Seed file not found: ${path.resolve(missing)}`);

    const invalid = await writeJson(tmp.file('invalid.json'), {
      memberships: { seasons: [{ name: 'Broken', start: '01/09/2024', end: '2025-08-31' }] },
    });
    await expect(
      deps.seeding.seedingService.importMembershipsSeed({ path: invalid, dryRun: false, purge: false }),
    ).rejects.toThrow(`Invalid seed document ${path.resolve(invalid)}: memberships.seasons.0.start: Expected YYYY-MM-DD`);
  });
});

describe('dump_memberships_seed export', () => {
  it('writes natural keys and round-trips through a fresh import', async () => {
    const tmp = await makeTempDir();
    try {
      const source = await buildTestDeps();
      await source.deps.seeding.seedingService.importMembershipsSeed({
        path: await writeJson(tmp.file('in.json'), membershipsDoc()),
        dryRun: false,
        purge: false,
      });

      const exported = await source.deps.seeding.seedingService.exportMembershipsSeed();
      expect(exported._meta).toEqual({ version: 3, notes: 'No subscriptions or player answers exported.' });
      expect(exported.memberships.products).toEqual([
        {
          season: SEASON,
          category: 'senior',
          name: 'Senior full',
          sku: 'SNR-FULL',
          list_price_gbp: '120.00',
          active: true,
          notes: '',
          requires_plan: true,
          pay_per_match: false,
          plans: [
            {
              label: 'Monthly',
              instalment_amount_gbp: '12.00',
              instalment_count: 10,
              frequency: 'monthly',
              includes_match_fees: true,
              active: true,
              display_order: 0,
            },
          ],
        },
      ]);
      expect(exported.memberships.match_fees[0]).toMatchObject({ category: 'senior', product: null });
      expect(exported.memberships.categories[0]?.applies_to).toEqual(['Adult']);

      const target = await buildTestDeps();
      const imported = await target.deps.seeding.seedingService.importMembershipsSeed({
        path: await writeJson(tmp.file('out.json'), exported),
        dryRun: false,
        purge: false,
      });
      expect(imported.counts.DynamicQuestion).toEqual({ created: 1, updated: 0, unchanged: 0 });

      expect(await target.deps.seeding.seedingService.exportMembershipsSeed()).toEqual(exported);
    } finally {
      await tmp.cleanup();
    }
  });
});
