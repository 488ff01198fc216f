#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { initializeEnvironment } from './config/environment';
import { runArchive } from './services/archiveService';
import { ArchiveError } from './utils/errors';
import { logger } from './utils/logger';
import './events/eventLogger';

interface CliOptions {
  maildir?: string;
  export?: string;
  timezone?: string;
  log?: string;
}

export function buildProgram(): Command {
  return new Command()
    .name('sms-chat-archive')
    .description('Rebuild per-conversation chat logs from a Maildir of SMS backup emails')
    .option('-m, --maildir <dir>', 'Maildir directory to process')
    .option('-e, --export <dir>', 'Directory to export chat logs to')
    .option('-t, --timezone <tz>', 'Timezone to display message times in (default: America/Los_Angeles)')
    .option('-l, --log <level>', 'Logging level to use: error, warn, info, debug (default: warn)');
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  try {
    const config = initializeEnvironment({
      maildir: options.maildir,
      exportDir: options.export,
      timezone: options.timezone,
      logLevel: options.log
    });
    logger.setLevel(config.logLevel);

    const result = await runArchive(config);
    if (!result.success) {
      reportFailure(result.error);
      return 1;
    }

    const summary = result.value;
    console.log(`✅ Indexed ${summary.records} messages from ${summary.identities} people into ${summary.conversations} conversations (${summary.threads} threads)`);
    if (summary.exported) {
      console.log(`📁 Exported ${summary.exported.threads} threads to ${config.exportDir}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof ArchiveError) {
      reportFailure(error);
    } else {
      logger.error('Unexpected failure', error as Error, { operation: 'main' });
      console.error('❌ Unexpected failure:', (error as Error).message);
    }
    return 1;
  }
}

function reportFailure(error: ArchiveError): void {
  logger.error('Archive run aborted', error, { operation: 'main' }, { code: error.code, details: error.details });
  console.error(`❌ ${error.code}: ${error.message}`);
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('❌ Fatal error:', error);
      process.exitCode = 1;
    }
  );
}
