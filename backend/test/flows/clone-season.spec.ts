import { buildTestDeps } from '../helpers/build-test-app';
import { addAddOn, addCategory, addMatchFee, addPlan, addProduct, addSeason } from '../helpers/fixtures';
import type { CloneSeasonParams } from '../../src/modules/memberships/membership.types';

const FROM = '2024/25';
const TO = '2025/26';

function params(overrides: Partial<CloneSeasonParams> = {}): CloneSeasonParams {
  return {
    from: FROM,
    to: TO,
    createTarget: true,
    overwrite: false,
    includeInactive: false,
    dryRun: false,
    ...overrides,
  };
}

async function setup() {
  const built = await buildTestDeps();
  const { store } = built;

  const season = await addSeason(store, FROM, { start: '2024-09-01', end: '2025-08-31' });
  const category = await addCategory(store, 'senior');
  const full = await addProduct(store, { seasonId: season.id, categoryId: category.id, sku: 'SNR-FULL', price: '120.00' });
  await addProduct(store, { seasonId: season.id, categoryId: category.id, sku: 'SNR-OLD', active: false });
  await addPlan(store, { productId: full.id, label: 'Monthly', displayOrder: 1 });
  await addPlan(store, { productId: full.id, label: 'Annual', displayOrder: 0 });
  await addAddOn(store, { seasonId: season.id, name: 'Kit' });
  await addMatchFee(store, { seasonId: season.id, name: 'Standard', categoryId: category.id });
  await addMatchFee(store, { seasonId: season.id, name: 'Full members', productId: full.id });

  return { ...built, season, category, full };
}

describe('clone_season', () => {
  it('creates the target one year on and copies the whole catalogue, inactive rows included', async () => {
    const { deps, store } = await setup();

    const result = await deps.memberships.membershipService.cloneSeason(params());

    expect(result.lines).toEqual([
      `Created target season '${TO}' (2025-09-01 -> 2026-08-31, is_active=false).`,
      `Cloning from ${FROM} -> ${TO}...`,
      'Clone complete.',
      '- Products:  +2',
      '- Plans:     +2',
      '- Add-ons:   +1',
      '- MatchFees: +2',
    ]);
    expect(result.targetCreated).toBe(true);

    const target = await store.findOne('seasons', { name: TO });
    const targetProducts = await store.list('membership_products', {
      where: { season_id: target?.id },
      orderBy: [{ column: 'sku' }],
    });
    expect(targetProducts.map((p) => [p.sku, p.active])).toEqual([
      ['SNR-FULL', true],
      ['SNR-OLD', false],
    ]);

    const scoped = await store.findOne('match_fee_tariffs', { season_id: target?.id, name: 'Full members' });
    expect(scoped?.product_id).toBe(targetProducts[0]?.id);

    expect(await store.count('audit_events', { action: 'season.cloned' })).toBe(1);
  });

  it('leaves existing target rows alone unless --overwrite is given', async () => {
    const { deps, store, full } = await setup();
    const service = deps.memberships.membershipService;
    await service.cloneSeason(params());

    await store.update('membership_products', full.id, { list_price_gbp: '135.00' });

    const again = await service.cloneSeason(params());
    expect(again.lines.slice(-4)).toEqual(['- Products:  +0', '- Plans:     +0', '- Add-ons:   +0', '- MatchFees: +0']);

    const overwritten = await service.cloneSeason(params({ overwrite: true }));
    expect(overwritten.products).toEqual({ created: 0, updated: 1 });
    expect(overwritten.lines.slice(-4)).toEqual([
      '- Products:  +0, updated 1',
      '- Plans:     +0, updated 0',
      '- Add-ons:   +0, updated 0',
      '- MatchFees: +0, updated 0',
    ]);

    const target = await store.findOne('seasons', { name: TO });
    const cloned = await store.findOne('membership_products', { season_id: target?.id, sku: 'SNR-FULL' });
    expect(cloned?.list_price_gbp).toBe('135.00');
  });

  it('skips a product-scoped tariff whose product is not in the source season', async () => {
    const { deps, store, season, category } = await setup();
    const other = await addSeason(store, '2023/24', { start: '2023-09-01', end: '2024-08-31' });
    const legacy = await addProduct(store, { seasonId: other.id, categoryId: category.id, sku: 'LEGACY' });
    await addMatchFee(store, { seasonId: season.id, name: 'Legacy rate', productId: legacy.id });

    const result = await deps.memberships.membershipService.cloneSeason(params());

    expect(result.skipped).toEqual(['Legacy rate']);
    expect(result.lines).toContain(
      `Skipping match fee 'Legacy rate' scoped to product '${legacy.id}' (no target product in ${TO}).`,
    );
    expect(result.matchFees).toEqual({ created: 2, updated: 0 });
  });

  it('rolls back a dry run, including the created target season', async () => {
    const { deps, store } = await setup();

    const result = await deps.memberships.membershipService.cloneSeason(params({ dryRun: true }));

    expect(result.lines.slice(2, 5)).toEqual(['DRY RUN - NO CHANGES WRITTEN', '', 'Clone complete.']);
    expect(await store.count('seasons')).toBe(1);
    expect(await store.count('audit_events')).toBe(0);
  });

  it('reports missing or identical seasons', async () => {
    const { deps } = await setup();
    const service = deps.memberships.membershipService;

    await expect(service.cloneSeason(params({ to: FROM }))).rejects.toThrow(
      `Source and target season are both '${FROM}'.`,
    );
    await expect(service.cloneSeason(params({ from: '1999/00' }))).rejects.toThrow("Source season '1999/00' not found.");
    await expect(service.cloneSeason(params({ createTarget: false }))).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: `Target season '${TO}' not found. Create it first or pass --create-target.`,
    });
  });
});
