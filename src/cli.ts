import { parseArgs } from 'util';
import { listJobs, logJobList, runJob } from './jobs/index.ts';
import { CONFIG_OPTIONS, createConfig, handleVersionHelp } from './setup/config.ts';
import { createDefaultRuntime } from './setup/runtime.ts';
import type { RuntimeOverrides } from './types.ts';

const HELP_TEXT = `
Usage: sheet-relay-jobs <command> [options]

Runs scheduled spreadsheet jobs.

Commands:
  list                   List available jobs
  run <job>              Run a job by name

Options:
  --max-time=<seconds>   Time budget before a graceful stop (default: 240)
  --transfer-config=<p>  JSON file overriding transfer job settings
  --version              Show version number
  --help                 Show this help message

Jobs:
${listJobs()
  .map((job) => `  ${job.name.padEnd(22)} ${job.description}`)
  .join('\n')}
`.trim();

/**
 * Job runner entry point. Resolves the process exit code.
 */
export default async function main(args: string[], overrides?: RuntimeOverrides): Promise<number> {
  const versionHelpResult = handleVersionHelp(args, HELP_TEXT);
  if (versionHelpResult.handled) {
    console.log(versionHelpResult.output);
    return 0;
  }

  const { positionals } = parseArgs({ args, options: CONFIG_OPTIONS, strict: false, allowPositionals: true });
  const [command, jobName] = positionals;
  const runtime = createDefaultRuntime(createConfig(args), overrides);

  if (command === 'list') {
    logJobList(runtime.logger);
    return 0;
  }

  if (command === 'run' && jobName) {
    return (await runJob(jobName, runtime)) ? 0 : 1;
  }

  runtime.logger.error({ command }, 'Expected "list" or "run <job>"');
  console.error(HELP_TEXT);
  return 1;
}
