/**
 * backend/src/modules/seeding/flows/import/import-players-seed-flow.ts
 *
 * WHY:
 * - Loads a players seed (and optionally their answers) idempotently.
 *
 * RULES:
 * - `deps.store` is the import transaction.
 * - Players match on public_id when the record has one, otherwise on
 *   membership_number. New players get a fresh public id and the next membership
 *   number when the record has none.
 * - An existing player is only written (and its updated_at bumped) when a field
 *   actually differs.
 * - A membership number held by a different player is a validation error.
 * - Answers never create players; the player must exist by the time answers run.
 */

import { randomUUID } from 'node:crypto';

import type { Logger } from '../../../../shared/logger/logger';
import type { RecordStore, Row } from '../../../../shared/db/record-store';
import { rowMatches, upsertRow } from '../../../../shared/db/upsert';
import type { AuditRepo } from '../../../../shared/audit/audit.repo';
import { AuditWriter } from '../../../../shared/audit/audit.writer';

import { getPlayerByPublicId, nextMembershipNumber } from '../../../members/dal/player.query-sql';
import { resolveNaturalKey } from '../../natural-keys';
import { SeedErrors } from '../../seed.errors';
import type {
  EntityCounts,
  ImportResult,
  PlayerAnswerSeedInput,
  PlayerSeedInput,
  PlayersSeedInput,
} from '../../seed.types';

export type ImportPlayersSeedParams = {
  document: PlayersSeedInput;
  source: string;
  onlyPlayers: boolean;
  dryRun: boolean;
  purge: boolean;
  now: Date;
};

function emptyCounts(): EntityCounts {
  return { created: 0, updated: 0, unchanged: 0 };
}

async function findExistingPlayer(store: RecordStore, record: PlayerSeedInput): Promise<Row<'players'> | null> {
  const key = resolveNaturalKey('Player', record);
  if (!key) return null;
  if (key.field === 'public_id') return getPlayerByPublicId(store, key.value);
  return store.findOne('players', { membership_number: key.value });
}

async function assertMembershipNumberFree(
  store: RecordStore,
  membershipNumber: string | null | undefined,
  self: Row<'players'> | null,
  playerKey: string,
): Promise<void> {
  if (!membershipNumber) return;
  const owner = await store.findOne('players', { membership_number: membershipNumber });
  if (owner && owner.id !== self?.id) {
    throw SeedErrors.membershipNumberTaken(membershipNumber, playerKey, owner.public_id);
  }
}

async function importPlayer(
  store: RecordStore,
  record: PlayerSeedInput,
  index: number,
  now: Date,
): Promise<'created' | 'updated' | 'unchanged'> {
  const playerKey = resolveNaturalKey('Player', record)?.value ?? `#${index + 1}`;

  const playerType = await store.findOne('player_types', { name: record.player_type });
  if (!playerType) throw SeedErrors.unknownReference('PlayerType', record.player_type, 'Player', playerKey);

  const fields = {
    first_name: record.first_name,
    last_name: record.last_name,
    date_of_birth: record.date_of_birth,
    gender: record.gender,
    relation: record.relation,
    player_type_id: playerType.id,
  };

  const existing = await findExistingPlayer(store, record);
  await assertMembershipNumberFree(store, record.membership_number, existing, playerKey);

  if (!existing) {
    await store.insert('players', {
      ...fields,
      public_id: record.public_id ?? randomUUID(),
      membership_number: record.membership_number ?? (await nextMembershipNumber(store)),
      created_at: now,
      updated_at: now,
    });
    return 'created';
  }

  const patch = record.membership_number ? { ...fields, membership_number: record.membership_number } : fields;
  if (rowMatches(existing, patch)) return 'unchanged';

  await store.update('players', existing.id, { ...patch, updated_at: now });
  return 'updated';
}

async function importAnswer(store: RecordStore, answer: PlayerAnswerSeedInput) {
  const key = `${answer.player_public_id}/${answer.question}`;

  const player = await getPlayerByPublicId(store, answer.player_public_id);
  if (!player) throw SeedErrors.unknownReference('Player', answer.player_public_id, 'PlayerAnswer', key);

  const question = await store.findOne('dynamic_questions', { code: answer.question });
  if (!question) throw SeedErrors.unknownReference('DynamicQuestion', answer.question, 'PlayerAnswer', key);

  const { outcome } = await upsertRow(store, 'player_answers', {
    match: { player_id: player.id, question_id: question.id },
    values: {
      player_id: player.id,
      question_id: question.id,
      text_answer: answer.text_answer,
      boolean_answer: answer.boolean_answer,
      detail_text: answer.detail_text,
      numeric_answer: answer.numeric_answer,
    },
  });
  return outcome;
}

export async function importPlayersSeedFlow(
  deps: { store: RecordStore; logger: Logger; auditRepo: AuditRepo },
  params: ImportPlayersSeedParams,
): Promise<ImportResult> {
  const flow = 'seeding.import_players';
  deps.logger.info({
    msg: `${flow}.start`,
    flow,
    source: params.source,
    dryRun: params.dryRun,
    purge: params.purge,
    onlyPlayers: params.onlyPlayers,
  });

  const lines: string[] = [];
  const players = emptyCounts();
  const answers = emptyCounts();

  if (params.purge && !params.onlyPlayers) {
    const purged = await deps.store.delete('player_answers');
    lines.push(`Purged ${purged} existing player answers.`);
  }

  for (const [index, record] of params.document.players.entries()) {
    players[await importPlayer(deps.store, record, index, params.now)] += 1;
  }

  if (!params.onlyPlayers) {
    for (const answer of params.document.answers ?? []) {
      answers[await importAnswer(deps.store, answer)] += 1;
    }
  }

  lines.push(
    params.dryRun ? 'Dry-run complete. Transaction rolled back.' : 'Import complete.',
    `Players: +${players.created}, updated ${players.updated}`,
    params.onlyPlayers
      ? 'Answers: skipped (--only-players)'
      : `Answers: +${answers.created}, updated ${answers.updated}`,
  );

  const counts: Record<string, EntityCounts> = params.onlyPlayers ? { Player: players } : { Player: players, PlayerAnswer: answers };

  if (!params.dryRun) {
    const audit = new AuditWriter(deps.auditRepo.withStore(deps.store));
    await audit.append('seed.players.imported', { source: params.source, onlyPlayers: params.onlyPlayers, counts });
  }

  deps.logger.info({ msg: `${flow}.success`, flow, dryRun: params.dryRun, counts });

  return { dryRun: params.dryRun, lines, counts };
}
