/**
 * backend/src/modules/seeding/flows/import/import-memberships-seed-flow.ts
 *
 * WHY:
 * - Idempotent import of a memberships seed document: a second run over the same
 *   document reports every row as unchanged.
 *
 * RULES:
 * - `deps.store` is the import transaction (SeedingService opens it, with
 *   rollback for --dry-run).
 * - Step order is fixed: catalogue first, then member configuration.
 * - Audited only when the writes are kept.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { RecordStore } from '../../../../shared/db/record-store';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../../shared/audit/audit.writer';

import { SeedReport } from '../../helpers/seed-report';
import type { ImportResult, MembershipsSeedInput } from '../../seed.types';
import type { ImportContext } from './import-context';
import {
  importAddOns,
  importCategories,
  importMatchFees,
  importPlayerTypes,
  importProducts,
  importSeasons,
} from './import-catalogue-steps';
import {
  importDynamicQuestions,
  importPositions,
  importQuestionCategories,
  importTeamMemberships,
  importTeams,
} from './import-member-config-steps';
import { purgeMembershipsConfig } from './purge-memberships-config';

export type ImportMembershipsSeedParams = {
  document: MembershipsSeedInput;
  source: string;
  dryRun: boolean;
  purge: boolean;
  now: Date;
};

export async function importMembershipsSeedFlow(
  deps: { store: RecordStore; logger: Logger; auditRepo: AuditRepo },
  params: ImportMembershipsSeedParams,
): Promise<ImportResult> {
  const flow = 'seeding.import_memberships';
  deps.logger.info({ msg: `${flow}.start`, flow, source: params.source, dryRun: params.dryRun, purge: params.purge });

  const ctx: ImportContext = { store: deps.store, report: new SeedReport(), now: params.now };
  const { memberships, members } = params.document;

  if (params.purge) await purgeMembershipsConfig(ctx);

  await importSeasons(ctx, memberships.seasons);
  await importPlayerTypes(ctx, members.player_types);
  await importCategories(ctx, memberships.categories);
  await importProducts(ctx, memberships.products);
  await importAddOns(ctx, memberships.addons);
  await importMatchFees(ctx, memberships.match_fees);

  await importPositions(ctx, members.positions);
  await importQuestionCategories(ctx, members.question_categories);
  await importDynamicQuestions(ctx, members.dynamic_questions);
  await importTeams(ctx, members.teams);
  await importTeamMemberships(ctx, members.team_memberships);

  const result = ctx.report.toResult(params.dryRun, [
    params.dryRun ? 'Dry-run complete. Transaction rolled back.' : 'Seeding complete.',
    ...ctx.report.summaryLines(),
  ]);

  if (!params.dryRun) {
    const audit = new AuditWriter(deps.auditRepo.withStore(deps.store));
    await audit.append('seed.memberships.imported', {
      source: params.source,
      purge: params.purge,
      counts: result.counts,
    });
  }

  deps.logger.info({ msg: `${flow}.success`, flow, dryRun: params.dryRun, counts: result.counts });

  return result;
}
