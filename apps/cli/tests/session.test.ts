import { describe, expect, it, vi } from 'vitest';
import {
  failure,
  success,
  type JobRecord,
  type JobSearchClient,
  type SearchCriteria,
  type SearchOutcome,
} from '@sapjobs/search-sdk';
import type { SearchSettings } from '../src/config.js';
import { availableCommands, parseCommand, runSession, type SessionIo } from '../src/session.js';

const settings: SearchSettings = {
  daysBack: 7,
  location: 'All Locations',
  remoteOnly: false,
  limit: 10,
};

function makeJobs(count: number): JobRecord[] {
  return Array.from({ length: count }, (_, index) => ({
    title: `SAP Role ${index + 1}`,
    company: 'Acme',
    location: 'N/A',
    postedDate: 'N/A',
    description: 'No description available',
    applyUrl: '#',
    employmentType: 'N/A',
    remote: false,
    salary: 'Not specified',
    industry: 'N/A',
  }));
}

function createClient(outcomes: SearchOutcome[]) {
  let idx = 0;
  const search = vi.fn(async (_criteria: SearchCriteria) => {
    const outcome = outcomes[Math.min(idx, outcomes.length - 1)]!;
    idx += 1;
    return outcome;
  });

  const client: JobSearchClient = { search };
  return { client, search };
}

function createIo(inputs: Array<string | null>) {
  const written: string[] = [];
  const io: SessionIo = {
    prompt: vi.fn(async () => (inputs.length > 0 ? (inputs.shift() ?? null) : null)),
    write: (text) => {
      written.push(text);
    },
  };

  return { io, written };
}

describe('parseCommand', () => {
  it('accepts short and long forms', () => {
    expect(parseCommand('n')).toBe('next');
    expect(parseCommand(' PREV ')).toBe('previous');
    expect(parseCommand('exit')).toBe('quit');
    expect(parseCommand('F')).toBe('filters');
    expect(parseCommand('later')).toBeNull();
  });
});

describe('availableCommands', () => {
  it('offers retry after a failure', () => {
    const commands = availableCommands(failure('network', 'Network error: fetch failed'), { offset: 10, limit: 10 });
    expect([...commands]).toEqual(['retry', 'filters', 'quit']);
  });

  it('offers previous and next from a full middle page', () => {
    const commands = availableCommands(success(makeJobs(10), 10), { offset: 10, limit: 10 });
    expect([...commands]).toEqual(['previous', 'next', 'filters', 'quit']);
  });
});

describe('runSession', () => {
  it('pages forward and back through results', async () => {
    const { client, search } = createClient([
      success(makeJobs(10), 10),
      success(makeJobs(4), 4),
      success(makeJobs(10), 10),
    ]);
    const { io } = createIo(['n', 'p', 'q']);

    const summary = await runSession({ client, settings, io });

    expect(search.mock.calls.map(([criteria]) => criteria.offset)).toEqual([0, 10, 0]);
    expect(search.mock.calls[0]?.[0]).toEqual({
      daysBack: 7,
      location: 'All Locations',
      remoteOnly: false,
      limit: 10,
      offset: 0,
    });
    expect(summary.searches).toBe(3);
    expect(summary.lastPage).toEqual({ offset: 0, limit: 10 });
  });

  it('re-prompts for unavailable commands without searching again', async () => {
    const { client, search } = createClient([success(makeJobs(3), 3)]);
    const { io, written } = createIo(['n', 'huh', 'q']);

    await runSession({ client, settings, io });

    expect(search).toHaveBeenCalledTimes(1);
    expect(written).toContain('Unknown command "n".\n');
    expect(written).toContain('Unknown command "huh".\n');
  });

  it('retries the same page after a failure', async () => {
    const { client, search } = createClient([
      failure('rate_limited', 'Rate limit exceeded. Please wait a moment and try again.', 429),
      success(makeJobs(2), 2),
    ]);
    const { io, written } = createIo(['r', 'q']);

    const summary = await runSession({ client, settings, io });

    expect(search).toHaveBeenCalledTimes(2);
    expect(search.mock.calls.map(([criteria]) => criteria.offset)).toEqual([0, 0]);
    expect(written[0]?.startsWith('Error: Rate limit exceeded.')).toBe(true);
    expect(summary.lastOutcome.kind).toBe('success');
  });

  it('ends when input runs out', async () => {
    const { client, search } = createClient([success([], 0)]);
    const { io } = createIo([]);

    const summary = await runSession({ client, settings, io });

    expect(search).toHaveBeenCalledTimes(1);
    expect(summary.searches).toBe(1);
  });

  it('searches again from the first page with new filters', async () => {
    const { client, search } = createClient([
      success(makeJobs(10), 10),
      success(makeJobs(10), 10),
      success(makeJobs(2), 2),
    ]);
    const { io } = createIo(['n', 'f', '3', 'y', '14', '50', 'q']);

    const summary = await runSession({ client, settings, io });

    expect(search.mock.calls.map(([criteria]) => criteria.offset)).toEqual([0, 10, 0]);
    expect(search.mock.calls[2]?.[0]).toEqual({
      daysBack: 14,
      location: 'Mumbai',
      remoteOnly: true,
      limit: 50,
      offset: 0,
    });
    expect(summary.lastSettings).toEqual({ daysBack: 14, location: 'Mumbai', remoteOnly: true, limit: 50 });
    expect(summary.lastPage).toEqual({ offset: 0, limit: 50 });
  });

  it('re-prompts for invalid filter answers and keeps blank ones', async () => {
    const { client, search } = createClient([success(makeJobs(3), 3)]);
    const { io, written } = createIo(['f', 'Atlantis', '', 'maybe', 'n', '0', '31', '', '20', '100', 'q']);

    await runSession({ client, settings, io });

    expect(search).toHaveBeenCalledTimes(2);
    expect(search.mock.calls[1]?.[0]).toEqual({
      daysBack: 7,
      location: 'All Locations',
      remoteOnly: false,
      limit: 100,
      offset: 0,
    });
    expect(written).toContain('Choose a location by number (1-15) or name.\n');
    expect(written).toContain('Answer y or n.\n');
    expect(written.filter((text) => text === 'Days back must be a whole number from 1 to 30.\n')).toHaveLength(2);
    expect(written).toContain('Page size must be one of 10, 25, 50, 100.\n');
  });

  it('offers filters after a failure', async () => {
    const { client, search } = createClient([
      failure('api_error', 'API error: 403 - forbidden', 403),
      success(makeJobs(1), 1),
    ]);
    const { io } = createIo(['f', 'Remote', '', '', '', 'q']);

    const summary = await runSession({ client, settings, io });

    expect(search.mock.calls[1]?.[0]).toMatchObject({ location: 'Remote', offset: 0 });
    expect(summary.lastOutcome.kind).toBe('success');
  });

  it('ends when input runs out while filters are entered', async () => {
    const { client, search } = createClient([success(makeJobs(3), 3)]);
    const { io } = createIo(['f', '2']);

    const summary = await runSession({ client, settings, io });

    expect(search).toHaveBeenCalledTimes(1);
    expect(summary.lastSettings).toEqual(settings);
  });
});
