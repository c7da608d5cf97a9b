/**
 * frontend/src/spond-link/search-box.ts
 *
 * WHY:
 * - The member search box as an explicit state machine:
 *   idle -> debouncing -> searching -> showing.
 *
 * RULES:
 * - Queries shorter than `minLength` (after trimming) go straight back to idle.
 * - The debounce restarts on every keystroke; only the last query is requested.
 * - Every keystroke bumps the sequence number. A response whose number is not the
 *   latest is dropped, so a slow answer never replaces a newer one.
 * - A failed search shows an empty result list.
 */

import type { MemberResult } from './spond-link.types';

export type SearchState =
  | { kind: 'idle' }
  | { kind: 'debouncing'; query: string }
  | { kind: 'searching'; query: string; seq: number }
  | { kind: 'showing'; query: string; results: MemberResult[] };

export const SEARCH_DEBOUNCE_MS = 250;
export const SEARCH_MIN_LENGTH = 2;

export class SearchBox {
  private state: SearchState = { kind: 'idle' };
  private timer: ReturnType<typeof setTimeout> | null = null;
  private seq = 0;

  constructor(
    private readonly deps: {
      search: (query: string) => Promise<MemberResult[]>;
      onChange: (state: SearchState) => void;
      debounceMs?: number;
      minLength?: number;
    },
  ) {}

  getState(): SearchState {
    return this.state;
  }

  input(raw: string): void {
    this.cancelTimer();
    this.seq += 1;

    const query = raw.trim();
    if (query.length < (this.deps.minLength ?? SEARCH_MIN_LENGTH)) {
      this.set({ kind: 'idle' });
      return;
    }

    const seq = this.seq;
    this.set({ kind: 'debouncing', query });
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.run(query, seq);
    }, this.deps.debounceMs ?? SEARCH_DEBOUNCE_MS);
  }

  /** Stops a pending debounce and ignores any response still in flight. */
  dispose(): void {
    this.cancelTimer();
    this.seq += 1;
  }

  private async run(query: string, seq: number): Promise<void> {
    this.set({ kind: 'searching', query, seq });

    const results = await this.deps.search(query).catch((): MemberResult[] => []);
    if (seq !== this.seq) return;

    this.set({ kind: 'showing', query, results });
  }

  private cancelTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private set(state: SearchState): void {
    this.state = state;
    this.deps.onChange(state);
  }
}
