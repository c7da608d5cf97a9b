/**
 * backend/src/modules/seeding/seeding.service.ts
 *
 * WHY:
 * - Orchestrates seed export/import for the CLI.
 * - Only place in this module allowed to start transactions.
 *
 * RULES:
 * - Files are read and validated before the transaction opens.
 * - An import is one transaction: any error rolls back every write, and
 *   --dry-run rolls back on success too.
 */

import type { Logger } from '../../shared/logger/logger';
import type { RecordStore } from '../../shared/db/record-store';
import type { AuditRepo } from '../../shared/audit/audit.repo';

import { membershipsSeedDocumentSchema, playersSeedDocumentSchema } from './seed.schemas';
import type { ImportResult, MembershipsSeedDocument, PlayersSeedDocument } from './seed.types';
import { readSeedFile } from './helpers/seed-file';
import { exportMembershipsSeedFlow } from './flows/export/export-memberships-seed-flow';
import { exportPlayersSeedFlow, type ExportPlayersSeedParams } from './flows/export/export-players-seed-flow';
import { importMembershipsSeedFlow } from './flows/import/import-memberships-seed-flow';
import { importPlayersSeedFlow } from './flows/import/import-players-seed-flow';

export type ImportMembershipsSeedOptions = {
  path: string;
  dryRun: boolean;
  purge: boolean;
};

export type ImportPlayersSeedOptions = ImportMembershipsSeedOptions & {
  onlyPlayers: boolean;
};

export class SeedingService {
  constructor(
    private readonly deps: {
      store: RecordStore;
      logger: Logger;
      auditRepo: AuditRepo;
      now?: () => Date;
    },
  ) {}

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }

  async exportMembershipsSeed(): Promise<MembershipsSeedDocument> {
    return exportMembershipsSeedFlow(this.deps);
  }

  async exportPlayersSeed(params: ExportPlayersSeedParams): Promise<PlayersSeedDocument> {
    return exportPlayersSeedFlow(this.deps, params);
  }

  async importMembershipsSeed(opts: ImportMembershipsSeedOptions): Promise<ImportResult> {
    const document = await readSeedFile(opts.path, membershipsSeedDocumentSchema);
    const now = this.now();

    return this.deps.store.transaction(
      (tx) =>
        importMembershipsSeedFlow(
          { store: tx, logger: this.deps.logger, auditRepo: this.deps.auditRepo },
          { document, source: opts.path, dryRun: opts.dryRun, purge: opts.purge, now },
        ),
      { rollback: opts.dryRun },
    );
  }

  async importPlayersSeed(opts: ImportPlayersSeedOptions): Promise<ImportResult> {
    const document = await readSeedFile(opts.path, playersSeedDocumentSchema);
    const now = this.now();

    return this.deps.store.transaction(
      (tx) =>
        importPlayersSeedFlow(
          { store: tx, logger: this.deps.logger, auditRepo: this.deps.auditRepo },
          {
            document,
            source: opts.path,
            onlyPlayers: opts.onlyPlayers,
            dryRun: opts.dryRun,
            purge: opts.purge,
            now,
          },
        ),
      { rollback: opts.dryRun },
    );
  }
}
