/**
 * Status - read-only report on the release record.
 *
 * Takes no lock and never writes, so it is safe at any time, including
 * while another invocation runs.
 */

import type { RelcutConfig } from '../domain/config.ts';
import type { Phase, ReleaseAttempt } from '../domain/types.ts';
import type { ReleaseRepo } from '../domain/vcs.ts';
import { isActive, nextStep } from '../core/machine.ts';
import type { StateStore } from '../storage/interface.ts';
import { checkConsistency } from './release.ts';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface StatusReport {
  inProgress: boolean;
  phase: Phase | null;
  attempt: ReleaseAttempt | null;
  /** Guidance for the user */
  next: string;
  /** Whole days since the attempt started */
  ageDays: number | null;
  stale: boolean;
  /** Where the repository disagrees with the record */
  problems: string[];
}

export interface StatusDeps {
  repo: ReleaseRepo;
  store: StateStore;
  config: RelcutConfig;
  now?: () => Date;
}

export async function releaseStatus(deps: StatusDeps): Promise<StatusReport> {
  const attempt = await deps.store.load();
  // A terminal record is kept with keepRecord
  const last = attempt;

  if (!isActive(attempt)) {
    return {
      inProgress: false,
      phase: last?.phase ?? null,
      attempt: last,
      next: 'No release in progress. Run relcut to start one.',
      ageDays: null,
      stale: false,
      problems: [],
    };
  }

  const now = (deps.now ?? (() => new Date()))();
  const started = Date.parse(attempt.createdAt);
  const ageDays = Number.isNaN(started) ? null : Math.floor((now.getTime() - started) / DAY_MS);

  return {
    inProgress: true,
    phase: attempt.phase,
    attempt,
    next: nextStep(attempt),
    ageDays,
    stale: ageDays !== null && ageDays >= deps.config.staleAfterDays,
    problems: await checkConsistency(deps.repo, attempt),
  };
}
