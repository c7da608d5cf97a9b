/**
 * backend/src/modules/seeding/flows/export/export-players-seed-flow.ts
 *
 * WHY:
 * - Dev/test environments need realistic players without copying the database.
 *
 * RULES:
 * - Players only go out with portable fields; the player type is its name.
 * - Answers reference the player's public id and the question code. No staff or
 *   audit references are exported.
 * - `onlyPlayers` leaves the answers key out entirely.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { RecordStore } from '../../../../shared/db/record-store';

import { listPlayersByRegistration } from '../../../members/dal/player.query-sql';
import { PLAYERS_SEED_VERSION, type PlayerAnswerSeed, type PlayersSeedDocument } from '../../seed.types';

export type ExportPlayersSeedParams = {
  onlyPlayers: boolean;
  limit?: number;
};

export async function exportPlayersSeedFlow(
  deps: { store: RecordStore; logger: Logger },
  params: ExportPlayersSeedParams,
): Promise<PlayersSeedDocument> {
  const flow = 'seeding.export_players';
  deps.logger.info({ msg: `${flow}.start`, flow, onlyPlayers: params.onlyPlayers, limit: params.limit });

  const playerTypes = new Map((await deps.store.list('player_types')).map((pt) => [pt.id, pt.name]));
  const players = await listPlayersByRegistration(deps.store, { limit: params.limit });

  const document: PlayersSeedDocument = {
    _meta: {
      version: PLAYERS_SEED_VERSION,
      note: params.onlyPlayers ? 'Players only' : 'Players + PlayerAnswers',
    },
    players: players.map((p) => ({
      public_id: p.public_id,
      membership_number: p.membership_number,
      first_name: p.first_name,
      last_name: p.last_name,
      date_of_birth: p.date_of_birth,
      gender: p.gender,
      relation: p.relation,
      player_type: playerTypes.get(p.player_type_id) ?? '',
    })),
  };

  if (!params.onlyPlayers) {
    const questionCodes = new Map((await deps.store.list('dynamic_questions')).map((q) => [q.id, q.code]));
    const answers: PlayerAnswerSeed[] = [];

    for (const player of players) {
      const rows = await deps.store.list('player_answers', { where: { player_id: player.id } });
      const forPlayer = rows
        .map((a) => ({
          player_public_id: player.public_id,
          question: questionCodes.get(a.question_id) ?? '',
          text_answer: a.text_answer,
          boolean_answer: a.boolean_answer,
          detail_text: a.detail_text,
          numeric_answer: a.numeric_answer,
        }))
        .sort((a, b) => (a.question < b.question ? -1 : a.question > b.question ? 1 : 0));
      answers.push(...forPlayer);
    }

    document.answers = answers;
  }

  deps.logger.info({
    msg: `${flow}.success`,
    flow,
    players: document.players.length,
    answers: document.answers?.length ?? 0,
  });

  return document;
}
