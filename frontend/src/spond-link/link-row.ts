/**
 * frontend/src/spond-link/link-row.ts
 *
 * WHY:
 * - One result row's "Link" action: unlinked -> linking -> linked | failed,
 *   and failed -> linking on retry.
 *
 * RULES:
 * - The state moves to linking (and the button disables) before the request is sent.
 * - Clicks while linking or linked do nothing.
 * - linked is terminal.
 * - A `link` that throws (synchronously or not) counts as a failure.
 */

export type LinkRowState = 'unlinked' | 'linking' | 'linked' | 'failed';

export class LinkRow {
  private state: LinkRowState = 'unlinked';

  constructor(
    private readonly deps: {
      link: () => Promise<boolean>;
      onChange: (state: LinkRowState) => void;
      onFailure: () => void;
    },
  ) {}

  getState(): LinkRowState {
    return this.state;
  }

  async click(): Promise<void> {
    if (this.state === 'linking' || this.state === 'linked') return;

    this.set('linking');
    if (await this.attempt()) {
      this.set('linked');
      return;
    }
    this.set('failed');
    this.deps.onFailure();
  }

  private async attempt(): Promise<boolean> {
    try {
      return await this.deps.link();
    } catch {
      return false;
    }
  }

  private set(state: LinkRowState): void {
    this.state = state;
    this.deps.onChange(state);
  }
}
