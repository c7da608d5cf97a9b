/**
 * backend/src/modules/seeding/helpers/seed-report.ts
 *
 * WHY:
 * - Import output is one line per row plus per-entity counts; a dry run prints the
 *   same report, so operators can diff what would change.
 *
 * HOW TO USE:
 * - report.record('Season', '2025/26', outcome)
 * - report.note('Purged 12 existing player answers.')
 * - report.toResult(dryRun) once the transaction has settled.
 */

import type { UpsertOutcome } from '../../../shared/db/upsert';
import type { EntityCounts, ImportResult } from '../seed.types';

export class SeedReport {
  private readonly lines: string[] = [];
  private readonly counts = new Map<string, EntityCounts>();

  record(entity: string, key: string, outcome: UpsertOutcome): void {
    this.lines.push(`${entity.padEnd(20)} ${key} -> ${outcome}`);

    const entry = this.counts.get(entity) ?? { created: 0, updated: 0, unchanged: 0 };
    entry[outcome] += 1;
    this.counts.set(entity, entry);
  }

  note(line: string): void {
    this.lines.push(line);
  }

  countsFor(entity: string): EntityCounts {
    return this.counts.get(entity) ?? { created: 0, updated: 0, unchanged: 0 };
  }

  /** `Season: +1, updated 0, unchanged 2` per entity, in first-seen order. */
  summaryLines(): string[] {
    return [...this.counts.entries()].map(
      ([entity, c]) => `${entity}: +${c.created}, updated ${c.updated}, unchanged ${c.unchanged}`,
    );
  }

  toResult(dryRun: boolean, closing: string[]): ImportResult {
    return {
      dryRun,
      lines: [...this.lines, ...closing],
      counts: Object.fromEntries(this.counts),
    };
  }
}
