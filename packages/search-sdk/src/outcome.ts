import type { JobRecord, SearchFailure, SearchFailureReason, SearchSuccess } from './types.js';

export function success(jobs: JobRecord[], total: number, skipped = 0): SearchSuccess {
  return { kind: 'success', jobs, total, skipped };
}

export function failure(reason: SearchFailureReason, errorMessage: string, status?: number): SearchFailure {
  if (status === undefined) {
    return { kind: 'failure', reason, errorMessage };
  }

  return { kind: 'failure', reason, errorMessage, status };
}
