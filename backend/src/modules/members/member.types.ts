/**
 * backend/src/modules/members/member.types.ts
 */

export type BackfillCandidate = {
  id: string;
  public_id: string;
  membership_number: string | null;
};

export type MembershipNumberChange = {
  playerId: string;
  publicId: string;
  from: string | null;
  to: string;
};

export type BackfillMembershipNumbersParams = {
  digits: number;
  force: boolean;
  dryRun: boolean;
};

export type BackfillMembershipNumbersResult = {
  changes: MembershipNumberChange[];
  written: boolean;
  lines: string[];
};
