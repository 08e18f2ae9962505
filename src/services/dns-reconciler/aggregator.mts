import type {
  HostIdentifier,
  HostReport,
  OutcomeLists,
  RunSummary,
} from './types.mts';
import type { Outcome } from './util.ts';
import { OUTCOME } from './util.ts';

const SUMMARY_KEY = {
  [OUTCOME.CHANGED]: 'changed',
  [OUTCOME.UNCHANGED]: 'unchanged',
  [OUTCOME.OFFLINE]: 'offline',
  [OUTCOME.ERROR]: 'error',
} as const satisfies Record<Outcome, keyof RunSummary>;

/**
 * Collects host reports into the four outcome lists.
 *
 * Counters are bumped once per interface decision. List membership is per
 * host: the host lands in the bucket of its last decision.
 */
export class RunAggregator {
  private readonly outcomeLists: OutcomeLists = {
    [OUTCOME.CHANGED]: [],
    [OUTCOME.UNCHANGED]: [],
    [OUTCOME.OFFLINE]: [],
    [OUTCOME.ERROR]: [],
  };

  private readonly counters: RunSummary = {
    changed: 0,
    unchanged: 0,
    offline: 0,
    error: 0,
  };

  private readonly seen = new Set<HostIdentifier>();

  public record(report: HostReport): Outcome {
    const last = report.decisions.at(-1);
    if (!last) {
      throw new Error(`Host ${report.hostId} was reported without a decision`);
    }
    if (this.seen.has(report.hostId)) {
      throw new Error(`Host ${report.hostId} was reported twice`);
    }
    this.seen.add(report.hostId);

    for (const decision of report.decisions) {
      this.counters[SUMMARY_KEY[decision.outcome]] += 1;
    }
    this.outcomeLists[last.outcome].push(report.hostId);

    return last.outcome;
  }

  public has(hostId: HostIdentifier) {
    return this.seen.has(hostId);
  }

  public lists(): OutcomeLists {
    return {
      [OUTCOME.CHANGED]: [...this.outcomeLists[OUTCOME.CHANGED]],
      [OUTCOME.UNCHANGED]: [...this.outcomeLists[OUTCOME.UNCHANGED]],
      [OUTCOME.OFFLINE]: [...this.outcomeLists[OUTCOME.OFFLINE]],
      [OUTCOME.ERROR]: [...this.outcomeLists[OUTCOME.ERROR]],
    };
  }

  public summary(): RunSummary {
    return { ...this.counters };
  }
}
