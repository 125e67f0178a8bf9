import type { CommitAction, CommitSummary } from '@ledgerlink/sync-engine';

export type CallOutcome = 'success' | 'error';

type MetricKey = string;

const RECORD_ACTIONS: readonly CommitAction[] = ['added', 'assigned', 'updated', 'deleted'];

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function labelsToKey(labels: Record<string, string>): string {
  const parts = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${escapeLabelValue(v)}"`);
  return parts.length ? `{${parts.join(',')}}` : '';
}

/**
 * In-process counters rendered in the Prometheus text exposition format
 */
export class Metrics {
  private readonly startedAt: number;
  private readonly counters = new Map<MetricKey, number>();
  private readonly durationMsSumByMethod = new Map<string, number>();
  private readonly durationMsCountByMethod = new Map<string, number>();
  private activeSessions = 0;

  constructor(private readonly clock: () => number = Date.now) {
    this.startedAt = clock();
  }

  private inc(key: MetricKey, by = 1): void {
    this.counters.set(key, (this.counters.get(key) ?? 0) + by);
  }

  incCall(method: string, outcome: CallOutcome): void {
    this.inc(`ledgerlink_connector_calls_total${labelsToKey({ method, outcome })}`);
  }

  observeCallDuration(method: string, durationMs: number): void {
    this.durationMsSumByMethod.set(method, (this.durationMsSumByMethod.get(method) ?? 0) + durationMs);
    this.durationMsCountByMethod.set(method, (this.durationMsCountByMethod.get(method) ?? 0) + 1);
  }

  /** Count the records a snapshot commit touched */
  recordCommit(summary: CommitSummary): void {
    for (const action of RECORD_ACTIONS) {
      const count = summary[action].length;
      if (count > 0) {
        this.inc(`ledgerlink_records_reconciled_total${labelsToKey({ entity: summary.entityType, action })}`, count);
      }
    }
    if (summary.conflicts > 0) {
      this.inc(`ledgerlink_field_conflicts_total${labelsToKey({ entity: summary.entityType })}`, summary.conflicts);
    }
  }

  setActiveSessions(value: number): void {
    this.activeSessions = value;
  }

  render(): string {
    const lines: string[] = [];
    const sortedCounters = Array.from(this.counters.entries()).sort(([a], [b]) => a.localeCompare(b));
    const counterLines = (prefix: string) => {
      for (const [key, value] of sortedCounters.filter(([k]) => k.startsWith(`${prefix}{`))) {
        lines.push(`${key} ${value}`);
      }
    };

    lines.push('# HELP ledgerlink_uptime_seconds Process uptime in seconds');
    lines.push('# TYPE ledgerlink_uptime_seconds gauge');
    lines.push(`ledgerlink_uptime_seconds ${(this.clock() - this.startedAt) / 1000}`);

    lines.push('# HELP ledgerlink_connector_calls_total Polling connector calls by method and outcome');
    lines.push('# TYPE ledgerlink_connector_calls_total counter');
    counterLines('ledgerlink_connector_calls_total');

    lines.push('# HELP ledgerlink_connector_call_duration_ms Polling connector call duration in milliseconds');
    lines.push('# TYPE ledgerlink_connector_call_duration_ms summary');
    for (const method of Array.from(this.durationMsSumByMethod.keys()).sort()) {
      const sum = this.durationMsSumByMethod.get(method) ?? 0;
      const count = this.durationMsCountByMethod.get(method) ?? 0;
      lines.push(`ledgerlink_connector_call_duration_ms_sum${labelsToKey({ method })} ${sum}`);
      lines.push(`ledgerlink_connector_call_duration_ms_count${labelsToKey({ method })} ${count}`);
    }

    lines.push('# HELP ledgerlink_records_reconciled_total Snapshot records changed by entity and action');
    lines.push('# TYPE ledgerlink_records_reconciled_total counter');
    counterLines('ledgerlink_records_reconciled_total');

    lines.push('# HELP ledgerlink_field_conflicts_total Fields changed on both sides since the last sync');
    lines.push('# TYPE ledgerlink_field_conflicts_total counter');
    counterLines('ledgerlink_field_conflicts_total');

    lines.push('# HELP ledgerlink_active_sessions Live polling sessions');
    lines.push('# TYPE ledgerlink_active_sessions gauge');
    lines.push(`ledgerlink_active_sessions ${this.activeSessions}`);

    return `${lines.join('\n')}\n`;
  }
}
