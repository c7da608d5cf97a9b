/**
 * backend/src/modules/scheduler/job-registry.ts
 *
 * WHY:
 * - Maps periodic_tasks.task names to the code that runs them.
 * - Jobs are registered at the composition root (app/jobs.ts), so this module
 *   never imports the modules whose work it schedules.
 */

import type { JobDefinition } from './scheduler.types';

export class JobRegistry {
  private readonly jobs = new Map<string, JobDefinition>();

  register(job: JobDefinition): this {
    if (this.jobs.has(job.name)) throw new Error(`Job '${job.name}' is already registered`);
    this.jobs.set(job.name, job);
    return this;
  }

  get(name: string): JobDefinition | null {
    return this.jobs.get(name) ?? null;
  }

  names(): string[] {
    return [...this.jobs.keys()].sort();
  }
}
