import type { JobRecord, SearchOutcome } from '@sapjobs/search-sdk';
import { pageNumber, type PageState } from './pagination.js';
import type { SessionCommand } from './session.js';

const DESCRIPTION_PREVIEW_LENGTH = 280;
const NO_RESULTS_MESSAGE = 'No SAP jobs found matching your criteria. Try adjusting your filters.';

const COMMAND_LABELS: Record<SessionCommand, string> = {
  previous: '[p] Previous',
  next: '[n] Next',
  retry: '[r] Retry',
  filters: '[f] Filters',
  quit: '[q] Quit',
};
const COMMAND_ORDER: SessionCommand[] = ['previous', 'next', 'retry', 'filters', 'quit'];

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function previewDescription(description: string, maxLength = DESCRIPTION_PREVIEW_LENGTH): string {
  const text = collapseWhitespace(description);
  if (text.length <= maxLength) {
    return text;
  }

  return `${text.slice(0, maxLength).trimEnd()}...`;
}

export function renderSummary(outcome: SearchOutcome): string {
  if (outcome.kind === 'failure') {
    return `Error: ${outcome.errorMessage}`;
  }

  if (outcome.jobs.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  return `Found ${outcome.total} SAP jobs!`;
}

export function renderJobCard(job: JobRecord, position: number): string {
  const lines = [
    `${position}. ${job.title}`,
    `   Company:  ${job.company}`,
    `   Location: ${job.location}${job.remote ? '  [Remote]' : ''}`,
    `   Posted:   ${job.postedDate}`,
    `   Type:     ${job.employmentType}`,
    `   Salary:   ${job.salary}`,
    `   Industry: ${job.industry}`,
  ];

  if (job.applyUrl !== '#') {
    lines.push(`   Apply:    ${job.applyUrl}`);
  }

  lines.push(`   ${previewDescription(job.description)}`);
  return lines.join('\n');
}

export function renderFooter(state: PageState, commands: ReadonlySet<SessionCommand>): string {
  const controls = COMMAND_ORDER.filter((command) => commands.has(command)).map((command) => COMMAND_LABELS[command]);
  return `Page ${pageNumber(state)}  ${controls.join('  ')}`;
}

export function renderPage(outcome: SearchOutcome, state: PageState, commands: ReadonlySet<SessionCommand>): string {
  const sections = [renderSummary(outcome)];

  if (outcome.kind === 'success') {
    outcome.jobs.forEach((job, index) => {
      sections.push(renderJobCard(job, state.offset + index + 1));
    });
  }

  sections.push(renderFooter(state, commands));
  return `${sections.join('\n\n')}\n`;
}
