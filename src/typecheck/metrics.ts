import type { MetricKind, MetricsSnapshot } from '../types.js';

export const METRIC_KINDS: readonly MetricKind[] = ['VAR', 'WHILE', 'IF', 'FUNC', 'OP'];

// 结构统计计数器：每个分析器实例一份，构造时清零，只增不减。
export class MetricCounters {
  private readonly counts: Record<MetricKind, number> = {
    VAR: 0,
    WHILE: 0,
    IF: 0,
    FUNC: 0,
    OP: 0,
  };

  increment(kind: MetricKind): void {
    this.counts[kind] += 1;
  }

  get(kind: MetricKind): number {
    return this.counts[kind];
  }

  snapshot(): MetricsSnapshot {
    return { ...this.counts };
  }
}

export function formatMetrics(metrics: MetricsSnapshot): string {
  return `{${METRIC_KINDS.map(kind => `${kind}:${metrics[kind]}`).join(', ')}}`;
}
