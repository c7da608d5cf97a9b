/**
 * frontend/src/spond-link/spond-link.types.ts
 */

export type MemberResult = {
  id: string;
  spond_member_id: string;
  name: string;
  email: string;
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
