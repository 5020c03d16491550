import { createInterface } from 'node:readline/promises';
import { LinkedInJobsClient } from '@sapjobs/linkedin-jobs';
import { ConfigError, loadConfig } from './config.js';
import { createCliLogger } from './observability/logger.js';
import { runSession, type SessionIo } from './session.js';

const logger = createCliLogger();

function createTerminalIo(): { io: SessionIo; close: () => void } {
  const rl = createInterface({ input: process.stdin, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    io: {
      prompt: async (question) => {
        process.stdout.write(question);
        const next = await lines.next();
        return next.done ? null : next.value;
      },
      write: (text) => {
        process.stdout.write(text);
      },
    },
    close: () => rl.close(),
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const client = new LinkedInJobsClient({ credentials: config.credentials, logger });
  const terminal = createTerminalIo();

  try {
    const summary = await runSession({ client, settings: config.search, io: terminal.io, logger });
    logger.info({ event: 'session_ended', searches: summary.searches, offset: summary.lastPage.offset }, 'Session ended');
  } finally {
    terminal.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error({ event: 'config_invalid', issues: error.issues }, error.message);
  } else {
    logger.error({ event: 'fatal', error: error instanceof Error ? error.message : String(error) }, 'Fatal error');
  }

  process.exitCode = 1;
});
