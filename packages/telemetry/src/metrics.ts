import { metrics, type Counter, type Histogram, type Meter, type MetricOptions } from "@opentelemetry/api";

export interface CoreInstrumentationOptions {
  readonly name?: string;
  readonly version?: string;
  readonly schemaUrl?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "credential-core";

export const getCoreMeter = (options: CoreInstrumentationOptions = {}): Meter =>
  metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });

export interface CoreInstrumentOptions extends MetricOptions {
  readonly instrumentation?: CoreInstrumentationOptions;
}

export const createCoreCounter = (name: string, options: CoreInstrumentOptions = {}): Counter => {
  const { instrumentation, ...counterOptions } = options;
  return getCoreMeter(instrumentation).createCounter(name, counterOptions);
};

export const createCoreHistogram = (name: string, options: CoreInstrumentOptions = {}): Histogram => {
  const { instrumentation, ...histogramOptions } = options;
  return getCoreMeter(instrumentation).createHistogram(name, histogramOptions);
};
