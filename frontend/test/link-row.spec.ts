import { describe, it, expect, vi } from 'vitest';

import { LinkRow, type LinkRowState } from '../src/spond-link/link-row';
import { deferred } from './helpers';

function buildRow(link: () => Promise<boolean>) {
  const states: LinkRowState[] = [];
  const onFailure = vi.fn();
  const row = new LinkRow({ link, onChange: (state) => states.push(state), onFailure });
  return { row, states, onFailure };
}

describe('LinkRow', () => {
  it('moves to linking before the request settles and ignores repeated clicks', async () => {
    const pending = deferred<boolean>();
    const link = vi.fn(() => pending.promise);
    const { row, states } = buildRow(link);

    const first = row.click();
    expect(row.getState()).toBe('linking');

    await row.click();
    expect(link).toHaveBeenCalledTimes(1);

    pending.resolve(true);
    await first;

    expect(row.getState()).toBe('linked');
    expect(states).toEqual(['linking', 'linked']);
  });

  it('stays linked for good', async () => {
    const link = vi.fn(async () => true);
    const { row } = buildRow(link);

    await row.click();
    await row.click();

    expect(link).toHaveBeenCalledTimes(1);
    expect(row.getState()).toBe('linked');
  });

  it('reports a failure and allows a retry', async () => {
    const link = vi.fn(async () => false);
    const { row, states, onFailure } = buildRow(link);

    await row.click();
    expect(row.getState()).toBe('failed');
    expect(onFailure).toHaveBeenCalledTimes(1);

    link.mockResolvedValueOnce(true);
    await row.click();

    expect(link).toHaveBeenCalledTimes(2);
    expect(states).toEqual(['linking', 'failed', 'linking', 'linked']);
  });

  it('treats a rejected request as a failure', async () => {
    const { row, onFailure } = buildRow(async () => {
      throw new Error('network down');
    });

    await row.click();

    expect(row.getState()).toBe('failed');
    expect(onFailure).toHaveBeenCalledTimes(1);
  });

  it('treats a link that throws before returning a promise as a failure', async () => {
    const { row, states, onFailure } = buildRow(() => {
      throw new URIError('URI malformed');
    });

    await row.click();

    expect(row.getState()).toBe('failed');
    expect(states).toEqual(['linking', 'failed']);
    expect(onFailure).toHaveBeenCalledTimes(1);
  });
});
