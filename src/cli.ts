#!/usr/bin/env node
/**
 * cli.ts — Command-line entry point.
 *
 *   gradebook-scrape run <classId> <period> --school 17 [--locale kk] [--template grades-sheet grades-brief]
 *   gradebook-scrape history [--school 17] [--from 2026-09-01]
 *   gradebook-scrape templates
 *   gradebook-scrape credentials
 *
 * Configuration comes from the environment (see .env.example).
 */

import 'dotenv/config';
import { Command } from 'commander';
import { loadPipelineConfig } from './core/config';
import { Logger } from './core/logger';
import { isTerminal } from './core/types';
import type { JobQuery, JobSpec } from './core/types';
import { TemplateRegistry } from './reports/templateRegistry';
import { createOrchestrator } from './scrapeOrchestrator';
import { DEFAULT_CREDENTIAL_REF, EnvCredentialProvider } from './services/envCredentials';

const logger = new Logger('CLI');

interface RunOptions {
  school: string;
  credential: string;
  locale?: string;
  template?: string[];
}

interface HistoryOptions {
  school?: string;
  credential?: string;
  from?: string;
  to?: string;
}

export function buildProgram(credentials = new EnvCredentialProvider()): Command {
  const program = new Command();
  program
    .name('gradebook-scrape')
    .description('Scrape a class grade table from the school portal and build reports');

  program
    .command('run')
    .description('Scrape one class for one period and write the reports')
    .argument('<classId>', 'class identifier from the grades list (link id or 1-based row)')
    .argument('<period>', 'reporting period, 1-4')
    .requiredOption('-s, --school <id>', 'school identifier recorded with the job')
    .option('-c, --credential <ref>', 'credential reference', DEFAULT_CREDENTIAL_REF)
    .option('-l, --locale <locale>', 'report language (ru | kk)')
    .option('-t, --template <ids...>', 'templates to render')
    .action(async (classId: string, period: string, options: RunOptions) => {
      await runJob(credentials, classId, period, options);
    });

  program
    .command('history')
    .description('List past jobs from the result store')
    .option('-s, --school <id>', 'only this school')
    .option('-c, --credential <ref>', 'only this credential reference')
    .option('--from <iso>', 'created at or after')
    .option('--to <iso>', 'created before')
    .action(async (options: HistoryOptions) => {
      await showHistory(credentials, options);
    });

  program
    .command('templates')
    .description('List the report templates that loaded')
    .action(async () => {
      const config = loadPipelineConfig();
      const registry = await TemplateRegistry.fromDirectory(config.templatesDir);
      for (const entry of registry.list()) console.log(entry);
    });

  program
    .command('credentials')
    .description('List the credential references configured in the environment')
    .action(() => {
      const refs = credentials.refs();
      if (refs.length === 0) logger.warn('No PORTAL_LOGIN / PORTAL_PASSWORD pair is set');
      for (const ref of refs) console.log(ref);
    });

  return program;
}

async function runJob(
  credentials: EnvCredentialProvider,
  classId: string,
  period: string,
  options: RunOptions,
): Promise<void> {
  const configured = credentials.refs();
  if (!configured.includes(options.credential)) {
    throw new Error(
      `Unknown credential reference "${options.credential}"; configured: ${configured.join(', ') || 'none'}`,
    );
  }

  const orchestrator = await createOrchestrator(credentials);
  const spec: JobSpec = {
    schoolId: options.school,
    classId,
    period,
    credentialRef: options.credential,
    ...(options.locale ? { locale: options.locale } : {}),
    ...(options.template ? { templates: options.template } : {}),
  };

  const stop = () => {
    logger.warn('Interrupted; cancelling');
    orchestrator.cancel(jobId);
  };
  const jobId = orchestrator.submit(spec);
  process.once('SIGINT', stop);

  try {
    await orchestrator.idle();
    const view = await orchestrator.get(jobId);
    if (!view) throw new Error(`Job ${jobId} vanished from the result store`);

    console.log(JSON.stringify({ job: view.job, artifacts: view.artifacts }, null, 2));
    if (isTerminal(view.job.status) && view.job.status !== 'Completed') {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener('SIGINT', stop);
    await orchestrator.shutdown();
  }
}

async function showHistory(credentials: EnvCredentialProvider, options: HistoryOptions): Promise<void> {
  const orchestrator = await createOrchestrator(credentials);
  const filter: JobQuery = {
    schoolId: options.school,
    credentialRef: options.credential,
    from: options.from,
    to: options.to,
  };
  try {
    const jobs = await orchestrator.history(filter);
    console.log(JSON.stringify(jobs, null, 2));
  } finally {
    await orchestrator.shutdown();
  }
}

// ── CLI entry point ────────────────────────────────────────

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      logger.error('Command failed', err);
      process.exit(1);
    });
}
