import { buildConfig } from '../../../src/app/config';

describe('buildConfig', () => {
  it('applies defaults for everything but the database url', () => {
    const config = buildConfig({ DATABASE_URL: 'postgres://localhost/clubhouse' });

    expect(config).toMatchObject({
      nodeEnv: 'development',
      port: 3000,
      redisUrl: null,
      spond: { apiToken: null, eventsLookbackDays: 7, eventsLookaheadDays: 60, searchRateLimitPerMinute: 60 },
      tasks: { digestEnabled: true, digestLookaheadDays: 7 },
      scheduler: { tickSeconds: 30, scheduleFile: 'config/schedule.json', prefix: 'settings:' },
      seed: { enabled: false },
    });
  });

  it('reads boolean flags as words, so "false" stays false', () => {
    const config = buildConfig({
      DATABASE_URL: 'postgres://localhost/clubhouse',
      TASKS_DIGEST_ENABLED: 'false',
      SEED_ON_START: 'yes',
    });

    expect(config.tasks.digestEnabled).toBe(false);
    expect(config.seed.enabled).toBe(true);
  });

  it('treats a blank token as unset', () => {
    const config = buildConfig({ DATABASE_URL: 'postgres://localhost/clubhouse', SPOND_API_TOKEN: '   ' });
    expect(config.spond.apiToken).toBeNull();
  });

  it('rejects an unknown NODE_ENV and a tick outside 5-60 seconds', () => {
    expect(() => buildConfig({ DATABASE_URL: 'postgres://x', NODE_ENV: 'staging' })).toThrow();
    expect(() => buildConfig({ DATABASE_URL: 'postgres://x', SCHEDULER_TICK_SECONDS: '2' })).toThrow();
  });
});
