import type http from 'node:http';
import { diag, DiagConsoleLogger, DiagLogLevel, type Meter, type Tracer, trace } from '@opentelemetry/api';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { MeterProvider, PeriodicExportingMetricReader, type MetricReader } from '@opentelemetry/sdk-metrics';
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  SimpleSpanProcessor,
  type SpanExporter,
  type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { defaultResource, resourceFromAttributes } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';

const SERVICE_NAME = 'maze-race-server';

type MetricsHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void | Promise<void>;

export interface TelemetryHandles {
  tracer: Tracer;
  meter: Meter;
  metricsHandler: MetricsHandler;
}

let handles: TelemetryHandles | null = null;

function createResource() {
  const attributes = resourceFromAttributes({
    [SemanticResourceAttributes.SERVICE_NAME]: process.env.OTEL_SERVICE_NAME ?? SERVICE_NAME,
    [SemanticResourceAttributes.SERVICE_VERSION]: process.env.npm_package_version ?? 'dev',
  });
  return defaultResource().merge(attributes);
}

function resolveOtlpUrl(specific: string | undefined, signal: 'traces' | 'metrics') {
  if (specific) {
    return specific;
  }
  const baseEndpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (!baseEndpoint) {
    return undefined;
  }
  const suffix = `/v1/${signal}`;
  return baseEndpoint.endsWith(suffix) ? baseEndpoint : `${baseEndpoint.replace(/\/$/, '')}${suffix}`;
}

function createSpanExporter(): SpanExporter | null {
  const url = resolveOtlpUrl(process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT, 'traces');
  if (url) {
    return new OTLPTraceExporter({ url });
  }
  // Every move message opens a span, so console output is opt-in.
  if (process.env.OTEL_TRACES_CONSOLE === '1') {
    return new ConsoleSpanExporter();
  }
  return null;
}

function createSpanProcessors(): SpanProcessor[] {
  const exporter = createSpanExporter();
  if (!exporter) {
    return [];
  }
  return [
    exporter instanceof ConsoleSpanExporter ? new SimpleSpanProcessor(exporter) : new BatchSpanProcessor(exporter),
  ];
}

function createMetricReaders() {
  const prometheusExporter = new PrometheusExporter({ preventServerStart: true });
  const readers: MetricReader[] = [prometheusExporter];

  const url = resolveOtlpUrl(process.env.OTEL_EXPORTER_OTLP_METRICS_ENDPOINT, 'metrics');
  if (url) {
    readers.push(new PeriodicExportingMetricReader({ exporter: new OTLPMetricExporter({ url }) }));
  }

  return { readers, prometheusExporter };
}

export function initTelemetry(): TelemetryHandles {
  if (handles) {
    return handles;
  }

  const diagLevel = process.env.OTEL_DEBUG ? DiagLogLevel.DEBUG : DiagLogLevel.ERROR;
  diag.setLogger(new DiagConsoleLogger(), diagLevel);

  const resource = createResource();

  const tracerProvider = new NodeTracerProvider({
    resource,
    spanProcessors: createSpanProcessors(),
  });
  tracerProvider.register();

  const { readers, prometheusExporter } = createMetricReaders();
  const meterProvider = new MeterProvider({ resource, readers });

  handles = {
    tracer: trace.getTracer(SERVICE_NAME),
    meter: meterProvider.getMeter(SERVICE_NAME),
    metricsHandler: (req, res) => prometheusExporter.getMetricsRequestHandler(req, res),
  };
  return handles;
}

export function getTracer(): Tracer {
  return initTelemetry().tracer;
}

export function getMeter(): Meter {
  return initTelemetry().meter;
}

export function getMetricsHandler(): MetricsHandler {
  return initTelemetry().metricsHandler;
}
