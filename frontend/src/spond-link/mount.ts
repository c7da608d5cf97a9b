/**
 * frontend/src/spond-link/mount.ts
 *
 * WHY:
 * - Wires the search box and the per-row link state machines to the page.
 *
 * HOW TO USE:
 * - The page provides `#spondSearch` (input), `#spondResults` (list) and the hidden
 *   `#spondPlayerId` input holding the player being linked.
 * - `mountSpondLink(document)`; returns null when the widget is not on the page.
 * - The page script calls `mountWhenReady(document)`, which waits for
 *   DOMContentLoaded when the document is still loading.
 */

import { CSRF_COOKIE, readCookie } from './cookies';
import { LinkRow } from './link-row';
import { renderLinkButton, renderResults } from './render';
import { SearchBox } from './search-box';
import { linkMember, searchMembers } from './spond-api';
import type { FetchLike } from './spond-link.types';

export const MISSING_PLAYER_MESSAGE = 'Missing player id on page.';
export const LINK_FAILED_MESSAGE = 'Failed to link.';

export type MountOptions = {
  fetchImpl?: FetchLike;
  alert?: (message: string) => void;
  debounceMs?: number;
};

export type MountedSpondLink = {
  searchBox: SearchBox;
  unmount: () => void;
};

function readPlayerId(doc: Document): string | null {
  const field = doc.getElementById('spondPlayerId');
  if (!(field instanceof HTMLInputElement)) return null;
  return field.value.trim() || null;
}

export function mountSpondLink(doc: Document, opts: MountOptions = {}): MountedSpondLink | null {
  const input = doc.getElementById('spondSearch');
  const list = doc.getElementById('spondResults');
  if (!(input instanceof HTMLInputElement) || !list) return null;

  const fetchImpl: FetchLike = opts.fetchImpl ?? ((url, init) => fetch(url, init));
  const alert = opts.alert ?? ((message: string) => doc.defaultView?.alert(message));

  const searchBox = new SearchBox({
    search: (query) => searchMembers(fetchImpl, query),
    onChange: (state) => {
      if (state.kind === 'idle') renderResults(list, []);
      if (state.kind === 'showing') renderResults(list, state.results);
    },
    debounceMs: opts.debounceMs,
  });

  const rows = new WeakMap<HTMLButtonElement, LinkRow>();

  const onInput = () => searchBox.input(input.value);

  const onClick = (event: Event) => {
    const target = event.target;
    if (!(target instanceof Element)) return;
    const button = target.closest('button[data-spond-pk]');
    if (!(button instanceof HTMLButtonElement)) return;

    const playerId = readPlayerId(doc);
    if (!playerId) {
      alert(MISSING_PLAYER_MESSAGE);
      return;
    }

    let row = rows.get(button);
    if (!row) {
      const spondMemberPk = button.dataset.spondPk ?? '';
      row = new LinkRow({
        link: () => linkMember(fetchImpl, { playerId, spondMemberPk, csrfToken: readCookie(doc.cookie, CSRF_COOKIE) }),
        onChange: (state) => renderLinkButton(button, state),
        onFailure: () => alert(LINK_FAILED_MESSAGE),
      });
      rows.set(button, row);
    }
    void row.click();
  };

  input.addEventListener('input', onInput);
  list.addEventListener('click', onClick);

  return {
    searchBox,
    unmount: () => {
      input.removeEventListener('input', onInput);
      list.removeEventListener('click', onClick);
      searchBox.dispose();
    },
  };
}

export function mountWhenReady(doc: Document, opts: MountOptions = {}): Promise<MountedSpondLink | null> {
  if (doc.readyState !== 'loading') return Promise.resolve(mountSpondLink(doc, opts));

  return new Promise((resolve) => {
    doc.addEventListener('DOMContentLoaded', () => resolve(mountSpondLink(doc, opts)), { once: true });
  });
}
