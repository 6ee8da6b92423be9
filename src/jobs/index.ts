import { errorMessage } from '../lib/errors.ts';
import type { RuntimeDeps } from '../types.ts';
import { runTransferDataJob } from './transfer-data.ts';

export interface JobDefinition {
  description: string;
  run(deps: RuntimeDeps): Promise<void>;
}

// Add new scheduled jobs here
export const JOBS = {
  transfer_data: {
    description: 'Transfer intake rows into the normalized list',
    run: async (deps: RuntimeDeps) => {
      await runTransferDataJob(deps);
    },
  },
} satisfies Record<string, JobDefinition>;

export type JobName = keyof typeof JOBS;

export function isJobName(name: string): name is JobName {
  return Object.hasOwn(JOBS, name);
}

export function listJobs(): Array<{ name: JobName; description: string }> {
  return Object.entries(JOBS).flatMap(([name, job]) => (isJobName(name) ? [{ name, description: job.description }] : []));
}

export function logJobList(logger: RuntimeDeps['logger']): void {
  logger.info('Available jobs:');
  for (const job of listJobs()) logger.info(`  - ${job.name}: ${job.description}`);
}

/**
 * Run a job by name. Resolves true once the job has run; unknown names and thrown errors are logged and resolve false.
 */
export async function runJob(name: string, deps: RuntimeDeps): Promise<boolean> {
  if (!isJobName(name)) {
    deps.logger.error({ job: name }, `Unknown job: ${name}`);
    logJobList(deps.logger);
    return false;
  }

  const job: JobDefinition = JOBS[name];
  deps.logger.info({ job: name }, `Running job: ${name} - ${job.description}`);
  try {
    await job.run(deps);
    deps.logger.info({ job: name }, `Job '${name}' completed successfully`);
    return true;
  } catch (error) {
    deps.logger.error({ job: name, error: errorMessage(error) }, `Error running job '${name}'`);
    return false;
  }
}
