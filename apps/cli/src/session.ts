import type { Logger } from 'pino';
import type { JobSearchClient, SearchOutcome } from '@sapjobs/search-sdk';
import type { SearchSettings } from './config.js';
import {
  createPageState,
  hasNextPage,
  hasPreviousPage,
  nextPage,
  previousPage,
  toCriteria,
  type PageState,
} from './pagination.js';
import { promptFilters } from './filters.js';
import { renderPage } from './render.js';

export type SessionCommand = 'next' | 'previous' | 'retry' | 'filters' | 'quit';

export interface SessionIo {
  /** Resolves to null once input is exhausted. */
  prompt(question: string): Promise<string | null>;
  write(text: string): void;
}

export interface RunSessionOptions {
  client: JobSearchClient;
  settings: SearchSettings;
  io: SessionIo;
  logger?: Logger;
}

export interface SessionSummary {
  searches: number;
  lastOutcome: SearchOutcome;
  lastPage: PageState;
  lastSettings: SearchSettings;
}

const COMMAND_ALIASES: Record<string, SessionCommand> = {
  n: 'next',
  next: 'next',
  p: 'previous',
  prev: 'previous',
  previous: 'previous',
  r: 'retry',
  retry: 'retry',
  f: 'filters',
  filters: 'filters',
  q: 'quit',
  quit: 'quit',
  exit: 'quit',
};

export function parseCommand(input: string): SessionCommand | null {
  return COMMAND_ALIASES[input.trim().toLowerCase()] ?? null;
}

export function availableCommands(outcome: SearchOutcome, state: PageState): Set<SessionCommand> {
  const commands = new Set<SessionCommand>();

  if (outcome.kind === 'failure') {
    commands.add('retry');
  } else {
    if (hasPreviousPage(state)) commands.add('previous');
    if (hasNextPage(state, outcome.total)) commands.add('next');
  }

  commands.add('filters');
  commands.add('quit');
  return commands;
}

async function readCommand(io: SessionIo, commands: ReadonlySet<SessionCommand>): Promise<SessionCommand> {
  while (true) {
    const input = await io.prompt('> ');
    if (input === null) {
      return 'quit';
    }

    const command = parseCommand(input);
    if (command && commands.has(command)) {
      return command;
    }

    io.write(`Unknown command "${input.trim()}".\n`);
  }
}

/**
 * Search, render, wait for a command, repeat. Each page replaces the
 * previous one; new filters restart from the first page. The loop ends on
 * quit or end of input.
 */
export async function runSession({
  client,
  settings: initialSettings,
  io,
  logger,
}: RunSessionOptions): Promise<SessionSummary> {
  let settings = initialSettings;
  let state = createPageState(settings.limit);
  let searches = 0;

  while (true) {
    const outcome = await client.search(toCriteria(settings, state));
    searches += 1;

    const commands = availableCommands(outcome, state);
    io.write(renderPage(outcome, state, commands));

    const command = await readCommand(io, commands);
    logger?.debug({ event: 'session_command', command, offset: state.offset }, 'Session command');

    if (command === 'quit') {
      return { searches, lastOutcome: outcome, lastPage: state, lastSettings: settings };
    }

    if (command === 'filters') {
      const updated = await promptFilters(io, settings);
      if (!updated) {
        return { searches, lastOutcome: outcome, lastPage: state, lastSettings: settings };
      }

      logger?.info({ event: 'filters_changed', ...updated }, 'Filters changed');
      settings = updated;
      state = createPageState(settings.limit);
      continue;
    }

    if (command === 'next') {
      state = nextPage(state);
    } else if (command === 'previous') {
      state = previousPage(state);
    }
  }
}
