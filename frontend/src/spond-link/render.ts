/**
 * frontend/src/spond-link/render.ts
 *
 * DOM output for the widget. Text is always set through textContent.
 */

import type { LinkRowState } from './link-row';
import type { MemberResult } from './spond-link.types';

export const NO_RESULTS_TEXT = 'No results';

export function renderResults(list: HTMLElement, results: MemberResult[]): void {
  const doc = list.ownerDocument;
  list.replaceChildren();

  if (!results.length) {
    const empty = doc.createElement('li');
    empty.className = 'list-group-item text-muted';
    empty.textContent = NO_RESULTS_TEXT;
    list.append(empty);
    return;
  }

  for (const result of results) {
    const item = doc.createElement('li');
    item.className = 'list-group-item d-flex justify-content-between align-items-center';

    const who = doc.createElement('div');
    const name = doc.createElement('div');
    name.className = 'fw-semibold';
    name.textContent = result.name;
    const email = doc.createElement('div');
    email.className = 'text-muted';
    email.textContent = result.email;
    who.append(name, email);

    const button = doc.createElement('button');
    button.type = 'button';
    button.className = 'btn btn-primary btn-sm';
    button.dataset.spondPk = result.id;
    button.textContent = 'Link';

    item.append(who, button);
    list.append(item);
  }
}

export function renderLinkButton(button: HTMLButtonElement, state: LinkRowState): void {
  button.disabled = state === 'linking' || state === 'linked';
  button.textContent = state === 'linked' ? 'Linked' : 'Link';
}
