/**
 * 指标注册表
 * 封装独立的 prom-client Registry，避免多实例共用全局注册表
 */

import { Registry, Counter, Gauge } from 'prom-client';
import { MetricDefinition } from './types';

type Labels = Record<string, string>;

export class MetricsRegistry {
  private readonly registry: Registry;
  private counters = new Map<string, Counter<string>>();
  private gauges = new Map<string, Gauge<string>>();

  constructor(defaultLabels: Labels = {}) {
    this.registry = new Registry();
    if (Object.keys(defaultLabels).length > 0) {
      this.registry.setDefaultLabels(defaultLabels);
    }
  }

  /**
   * 注册指标（重复注册同名指标时忽略）
   */
  register(definition: MetricDefinition): void {
    const { name, description, type, labels = [] } = definition;
    if (this.counters.has(name) || this.gauges.has(name)) {
      return;
    }

    switch (type) {
      case 'counter':
        this.counters.set(name, new Counter({
          name,
          help: description,
          labelNames: labels,
          registers: [this.registry]
        }));
        break;
      case 'gauge':
        this.gauges.set(name, new Gauge({
          name,
          help: description,
          labelNames: labels,
          registers: [this.registry]
        }));
        break;
      default:
        throw new Error(`Unsupported metric type: ${String(type)}`);
    }
  }

  /**
   * 增加计数器
   */
  incrementCounter(name: string, value = 1, labels?: Labels): void {
    const counter = this.counters.get(name);
    if (!counter) {
      throw new Error(`Counter metric not found: ${name}`);
    }
    if (labels) {
      counter.inc(labels, value);
    } else {
      counter.inc(value);
    }
  }

  /**
   * 设置仪表值
   */
  setGauge(name: string, value: number, labels?: Labels): void {
    const gauge = this.gauges.get(name);
    if (!gauge) {
      throw new Error(`Gauge metric not found: ${name}`);
    }
    if (labels) {
      gauge.set(labels, value);
    } else {
      gauge.set(value);
    }
  }

  /**
   * 读取指标当前值，标签需完全匹配
   */
  async getMetricValue(name: string, labels: Labels = {}): Promise<number> {
    const metric = this.counters.get(name) || this.gauges.get(name);
    if (!metric) {
      throw new Error(`Metric not found: ${name}`);
    }

    const snapshot = await metric.get();
    const wanted = Object.entries(labels);
    const entry = snapshot.values.find(value =>
      wanted.length === Object.keys(value.labels).length &&
      wanted.every(([key, expected]) => String(value.labels[key]) === expected)
    );
    return entry ? entry.value : 0;
  }

  /**
   * 导出 Prometheus 文本格式
   */
  async getMetricsText(): Promise<string> {
    return this.registry.metrics();
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}
