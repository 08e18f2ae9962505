import type {
  HostReport,
  RunSummary,
} from '../services/dns-reconciler/types.mts';
import type { Outcome } from '../services/dns-reconciler/util.ts';
import { OUTCOME } from '../services/dns-reconciler/util.ts';

const COLORS = {
  RED: '\x1b[0;31m',
  GREEN: '\x1b[0;32m',
  YELLOW: '\x1b[1;33m',
  CYAN: '\x1b[0;36m',
  GRAY: '\x1b[0;90m',
  NC: '\x1b[0m',
};

const OUTCOME_COLOR: Record<Outcome, string> = {
  [OUTCOME.CHANGED]: COLORS.GREEN,
  [OUTCOME.UNCHANGED]: COLORS.GRAY,
  [OUTCOME.OFFLINE]: COLORS.YELLOW,
  [OUTCOME.ERROR]: COLORS.RED,
};

export function formatSummary(summary: RunSummary) {
  return [
    `Changed:${summary.changed.toString()}`,
    `Unchanged:${summary.unchanged.toString()}`,
    `Offline:${summary.offline.toString()}`,
    `Error:${summary.error.toString()}`,
  ].join('; ');
}

export function formatHostLine(report: HostReport) {
  return report.decisions
    .map((decision) => {
      const iface = decision.interfaceName
        ? ` [${decision.interfaceName}]`
        : '';
      const note = decision.note ? ` - ${decision.note}` : '';
      return `${report.hostId}${iface}: ${decision.outcome}${note}`;
    })
    .join('\n');
}

export function uiHost(report: HostReport): void {
  for (const decision of report.decisions) {
    const color = OUTCOME_COLOR[decision.outcome];
    const line = formatHostLine({
      hostId: report.hostId,
      decisions: [decision],
    });
    console.log(`${color}${line}${COLORS.NC}`);
  }
}

export function uiHeader(title: string): void {
  console.log('');
  console.log(`${COLORS.CYAN}━━━ ${title} ━━━${COLORS.NC}`);
}

export function uiInfo(msg: string): void {
  console.log(msg);
}

export function uiWarn(msg: string): void {
  console.log(`${COLORS.YELLOW}!${COLORS.NC} ${msg}`);
}

export function uiError(msg: string): void {
  console.error(`${COLORS.RED}x${COLORS.NC} ${msg}`);
}
