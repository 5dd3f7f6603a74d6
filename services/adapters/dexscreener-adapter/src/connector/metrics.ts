/**
 * 适配器指标定义
 */

import { MetricDefinition, MetricsRegistry } from '@dexstream/shared-core';

export const METRIC_FRAMES_TOTAL = 'dexstream_frames_total';
export const METRIC_RECORDS_TOTAL = 'dexstream_records_total';
export const METRIC_CHUNKS_SKIPPED_TOTAL = 'dexstream_chunks_skipped_total';
export const METRIC_RECONNECTS_TOTAL = 'dexstream_reconnects_total';
export const METRIC_CONNECTION_STATE = 'dexstream_connection_state';

/** frames_total 的 outcome 标签取值 */
export type FrameOutcomeLabel = 'decoded' | 'unrecognized' | 'text';

export const ADAPTER_METRICS: readonly MetricDefinition[] = [
  {
    name: METRIC_FRAMES_TOTAL,
    description: 'Inbound frames by outcome',
    type: 'counter',
    labels: ['outcome']
  },
  {
    name: METRIC_RECORDS_TOTAL,
    description: 'Decoded records by kind',
    type: 'counter',
    labels: ['kind']
  },
  {
    name: METRIC_CHUNKS_SKIPPED_TOTAL,
    description: 'Skipped chunks by reason',
    type: 'counter',
    labels: ['reason']
  },
  {
    name: METRIC_RECONNECTS_TOTAL,
    description: 'Reconnect attempts scheduled',
    type: 'counter'
  },
  {
    name: METRIC_CONNECTION_STATE,
    description: 'Connection state (0 disconnected, 1 connecting, 2 connected, 3 backoff, 4 stopped)',
    type: 'gauge'
  }
];

export function registerAdapterMetrics(metrics: MetricsRegistry): void {
  for (const definition of ADAPTER_METRICS) {
    metrics.register(definition);
  }
}
