import { logger as defaultLogger, type LogFields, type Logger } from './logger';

export interface MetricDimensions extends LogFields {}

export interface Metrics {
  counter: (name: string, value?: number, dimensions?: MetricDimensions) => void;
  timer: (name: string, durationMs: number, dimensions?: MetricDimensions) => void;
}

export const createMetrics = (target: Logger = defaultLogger): Metrics => ({
  counter: (name, value = 1, dimensions = {}) => {
    target.info('metric.counter', {
      metric: name,
      value,
      ...dimensions,
    });
  },
  timer: (name, durationMs, dimensions = {}) => {
    target.info('metric.timer', {
      metric: name,
      durationMs,
      ...dimensions,
    });
  },
});

export const metrics = createMetrics();
