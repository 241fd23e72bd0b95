/**
 * Metrics Module
 * In-memory counters with Prometheus text export, served at /metrics by the
 * HTTP transport and summarized by the CLI after a validation run
 */

import type { ValidationOutcome } from '../pipeline/types.js';

interface Counter {
  count: number;
}

interface LatencyMetric {
  sum: number;
  count: number;
}

export type GeocoderEndpoint = 'lookup' | 'search';
export type GeocoderOutcome = 'ok' | 'empty' | 'error';

/**
 * Metrics collector singleton
 */
class MetricsCollector {
  // harvester_tool_calls_total{tool_name, outcome}
  private toolCalls: Map<string, Map<string, Counter>> = new Map();

  // harvester_tool_latency_ms{tool_name}
  private latencies: Map<string, LatencyMetric> = new Map();

  // harvester_geocoder_requests_total{endpoint, outcome}
  private geocoderRequests: Map<string, Counter> = new Map();

  // harvester_validation_outcomes_total{outcome}
  private validationOutcomes: Map<ValidationOutcome, Counter> = new Map();

  incrementToolCall(toolName: string, outcome: 'success' | 'error'): void {
    let outcomeMap = this.toolCalls.get(toolName);
    if (!outcomeMap) {
      outcomeMap = new Map();
      this.toolCalls.set(toolName, outcomeMap);
    }
    increment(outcomeMap, outcome);
  }

  recordLatency(toolName: string, latencyMs: number): void {
    let metric = this.latencies.get(toolName);
    if (!metric) {
      metric = { sum: 0, count: 0 };
      this.latencies.set(toolName, metric);
    }
    metric.sum += latencyMs;
    metric.count++;
  }

  incrementGeocoderRequest(endpoint: GeocoderEndpoint, outcome: GeocoderOutcome): void {
    increment(this.geocoderRequests, `${endpoint}|${outcome}`);
  }

  incrementValidationOutcome(outcome: ValidationOutcome): void {
    increment(this.validationOutcomes, outcome);
  }

  /**
   * Get current metrics snapshot
   */
  getMetrics() {
    const toolCallsData: Record<string, Record<string, number>> = {};
    this.toolCalls.forEach((outcomeMap, toolName) => {
      const perOutcome: Record<string, number> = {};
      outcomeMap.forEach((metric, outcome) => {
        perOutcome[outcome] = metric.count;
      });
      toolCallsData[toolName] = perOutcome;
    });

    const latenciesData: Record<string, { avg: number; count: number }> = {};
    this.latencies.forEach((metric, toolName) => {
      latenciesData[toolName] = {
        avg: metric.count > 0 ? metric.sum / metric.count : 0,
        count: metric.count,
      };
    });

    const geocoderData: Record<string, number> = {};
    this.geocoderRequests.forEach((metric, key) => {
      geocoderData[key.replace('|', '.')] = metric.count;
    });

    const validationData: Partial<Record<ValidationOutcome, number>> = {};
    this.validationOutcomes.forEach((metric, outcome) => {
      validationData[outcome] = metric.count;
    });

    return {
      toolCalls: toolCallsData,
      latencies: latenciesData,
      geocoderRequests: geocoderData,
      validationOutcomes: validationData,
    };
  }

  /**
   * Export metrics in Prometheus text format
   * See: https://prometheus.io/docs/instrumenting/exposition_formats/
   */
  exportPrometheus(): string {
    const lines: string[] = [];

    lines.push('# HELP harvester_tool_calls_total Total number of MCP tool calls by tool name and outcome');
    lines.push('# TYPE harvester_tool_calls_total counter');
    this.toolCalls.forEach((outcomeMap, toolName) => {
      outcomeMap.forEach((metric, outcome) => {
        lines.push(`harvester_tool_calls_total{tool_name="${toolName}",outcome="${outcome}"} ${metric.count}`);
      });
    });

    lines.push('');
    lines.push('# HELP harvester_tool_latency_ms_avg Average latency of MCP tool calls in milliseconds');
    lines.push('# TYPE harvester_tool_latency_ms_avg gauge');
    this.latencies.forEach((metric, toolName) => {
      const avg = metric.count > 0 ? metric.sum / metric.count : 0;
      lines.push(`harvester_tool_latency_ms_avg{tool_name="${toolName}"} ${avg.toFixed(2)}`);
    });

    lines.push('');
    lines.push('# HELP harvester_geocoder_requests_total Geocoder requests by endpoint and outcome');
    lines.push('# TYPE harvester_geocoder_requests_total counter');
    this.geocoderRequests.forEach((metric, key) => {
      const [endpoint, outcome] = key.split('|');
      lines.push(`harvester_geocoder_requests_total{endpoint="${endpoint}",outcome="${outcome}"} ${metric.count}`);
    });

    lines.push('');
    lines.push('# HELP harvester_validation_outcomes_total Validated element ids by outcome');
    lines.push('# TYPE harvester_validation_outcomes_total counter');
    this.validationOutcomes.forEach((metric, outcome) => {
      lines.push(`harvester_validation_outcomes_total{outcome="${outcome}"} ${metric.count}`);
    });

    return lines.join('\n') + '\n';
  }

  /**
   * Reset all metrics (useful for testing)
   */
  reset(): void {
    this.toolCalls.clear();
    this.latencies.clear();
    this.geocoderRequests.clear();
    this.validationOutcomes.clear();
  }
}

function increment<K>(map: Map<K, Counter>, key: K): void {
  const metric = map.get(key);
  if (metric) {
    metric.count++;
  } else {
    map.set(key, { count: 1 });
  }
}

// Singleton metrics collector
export const metrics = new MetricsCollector();
