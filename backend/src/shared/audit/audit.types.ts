/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (operational trail stored in DB).
 * - AuditAction uses a union + escape hatch to catch typos early
 *   while still allowing new actions without touching this file.
 *
 * RULES:
 * - Metadata is a plain object (repo serializes to JSON for DB).
 * - Never import module types here (shared must stay module-agnostic).
 */

export type KnownAuditAction =
  // Spond links (HTTP)
  | 'spond.link.created'
  | 'spond.link.deactivated'
  // Seed imports / clone (CLI)
  | 'seed.memberships.imported'
  | 'seed.players.imported'
  | 'season.cloned'
  // Scheduler admin
  | 'scheduler.task.toggled';

export type AuditAction = KnownAuditAction | (string & {});

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context shared by every event of one request or command run.
 * CLI commands have no request id.
 */
export type AuditContext = {
  requestId: string | null;
};

export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};
