import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { SearchBox, type SearchState } from '../src/spond-link/search-box';
import type { MemberResult } from '../src/spond-link/spond-link.types';
import { deferred, flushMicrotasks, member } from './helpers';

describe('SearchBox', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('requests only the last query typed within the debounce window', async () => {
    const search = vi.fn(async (query: string) => [member('1', `Hit ${query}`)]);
    const box = new SearchBox({ search, onChange: () => undefined });

    box.input('a');
    box.input('ab');
    expect(box.getState()).toEqual({ kind: 'debouncing', query: 'ab' });

    vi.advanceTimersByTime(249);
    expect(search).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(search).toHaveBeenCalledTimes(1);
    expect(search).toHaveBeenCalledWith('ab');

    await flushMicrotasks();
    expect(box.getState()).toEqual({ kind: 'showing', query: 'ab', results: [member('1', 'Hit ab')] });
  });

  it('restarts the debounce on every keystroke', () => {
    const search = vi.fn(async (): Promise<MemberResult[]> => []);
    const box = new SearchBox({ search, onChange: () => undefined });

    box.input('an');
    vi.advanceTimersByTime(200);
    box.input('ann');
    vi.advanceTimersByTime(200);
    expect(search).not.toHaveBeenCalled();

    vi.advanceTimersByTime(50);
    expect(search).toHaveBeenCalledTimes(1);
    expect(search).toHaveBeenCalledWith('ann');
  });

  it('goes back to idle for short input and never searches', () => {
    const search = vi.fn(async (): Promise<MemberResult[]> => []);
    const states: SearchState[] = [];
    const box = new SearchBox({ search, onChange: (state) => states.push(state) });

    box.input('ab');
    box.input(' a ');
    vi.advanceTimersByTime(1000);

    expect(search).not.toHaveBeenCalled();
    expect(states).toEqual([{ kind: 'debouncing', query: 'ab' }, { kind: 'idle' }]);
  });

  it('trims the query before searching', () => {
    const search = vi.fn(async (): Promise<MemberResult[]> => []);
    const box = new SearchBox({ search, onChange: () => undefined });

    box.input('  lee ');
    vi.advanceTimersByTime(250);

    expect(search).toHaveBeenCalledWith('lee');
  });

  it('drops a response that arrives after a newer query was requested', async () => {
    const first = deferred<MemberResult[]>();
    const second = deferred<MemberResult[]>();
    const search = vi.fn((query: string) => (query === 'ab' ? first.promise : second.promise));
    const box = new SearchBox({ search, onChange: () => undefined });

    box.input('ab');
    vi.advanceTimersByTime(250);
    box.input('abc');
    vi.advanceTimersByTime(250);
    expect(search).toHaveBeenCalledTimes(2);

    second.resolve([member('2', 'Newer')]);
    await flushMicrotasks();
    first.resolve([member('1', 'Older')]);
    await flushMicrotasks();

    expect(box.getState()).toEqual({ kind: 'showing', query: 'abc', results: [member('2', 'Newer')] });
  });

  it('ignores an in-flight response once the user keeps typing', async () => {
    const pending = deferred<MemberResult[]>();
    const search = vi.fn(() => pending.promise);
    const box = new SearchBox({ search, onChange: () => undefined });

    box.input('ab');
    vi.advanceTimersByTime(250);
    expect(box.getState()).toEqual({ kind: 'searching', query: 'ab', seq: 1 });

    box.input('abc');
    pending.resolve([member('1', 'Stale')]);
    await flushMicrotasks();

    expect(box.getState()).toEqual({ kind: 'debouncing', query: 'abc' });
  });

  it('shows an empty list when the search fails', async () => {
    const search = vi.fn(async (): Promise<MemberResult[]> => {
      throw new Error('offline');
    });
    const box = new SearchBox({ search, onChange: () => undefined });

    box.input('ann');
    vi.advanceTimersByTime(250);
    await flushMicrotasks();

    expect(box.getState()).toEqual({ kind: 'showing', query: 'ann', results: [] });
  });

  it('dispose cancels the pending debounce', () => {
    const search = vi.fn(async (): Promise<MemberResult[]> => []);
    const box = new SearchBox({ search, onChange: () => undefined });

    box.input('ann');
    box.dispose();
    vi.advanceTimersByTime(1000);

    expect(search).not.toHaveBeenCalled();
  });
});
