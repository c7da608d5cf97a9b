/**
 * backend/src/modules/spond/spond.types.ts
 */

import type { Row } from '../../shared/db/record-store';

export type SpondMember = Row<'spond_members'>;
export type PlayerSpondLink = Row<'player_spond_links'>;

export type MemberSearchResult = {
  id: string;
  spond_member_id: string;
  name: string;
  email: string;
};

export type SyncSkipped = {
  skipped: 'no_token';
  message: string;
};

export type SyncMembersResult = {
  members: number;
  groups: number;
  message: string;
};

export type SyncCounts = {
  created: number;
  updated: number;
  unchanged: number;
};

export type SyncEventsResult = SyncCounts & {
  fetched: number;
  message: string;
};

export type SyncTransactionsResult = SyncCounts & {
  pages: number;
  message: string;
};

export type LinkPlayerParams = {
  playerId: string;
  spondMemberPk: string;
  requestId: string | null;
};

export type UnlinkPlayerParams = {
  playerId: string;
  linkId: string;
  requestId: string | null;
};
