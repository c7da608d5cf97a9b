/**
 * frontend/src/index.ts
 */

export { mountSpondLink, mountWhenReady, type MountOptions, type MountedSpondLink } from './spond-link/mount';
export { SearchBox, type SearchState } from './spond-link/search-box';
export { LinkRow, type LinkRowState } from './spond-link/link-row';
export { linkMember, searchMembers } from './spond-link/spond-api';
export type { FetchLike, MemberResult } from './spond-link/spond-link.types';
