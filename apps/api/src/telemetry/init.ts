import { diag, DiagConsoleLogger, DiagLogLevel } from "@opentelemetry/api";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { SEMRESATTRS_DEPLOYMENT_ENVIRONMENT, SEMRESATTRS_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { AppConfig } from "@tollgate/shared";

export type TelemetryShutdown = () => Promise<void>;

/**
 * Starts tracing when an OTLP endpoint is configured. Without one the SDK is
 * not started at all and spans created by `withSpan` are no-ops.
 */
export async function initTelemetry(config: AppConfig): Promise<TelemetryShutdown> {
  if (!config.OTEL_EXPORTER_OTLP_ENDPOINT) {
    return async () => undefined;
  }

  if (config.NODE_ENV === "development") {
    diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);
  }

  const sdk = new NodeSDK({
    resource: new Resource({
      [SEMRESATTRS_SERVICE_NAME]: config.OTEL_SERVICE_NAME,
      [SEMRESATTRS_DEPLOYMENT_ENVIRONMENT]: config.NODE_ENV
    }),
    traceExporter: new OTLPTraceExporter({ url: config.OTEL_EXPORTER_OTLP_ENDPOINT }),
    instrumentations: [
      getNodeAutoInstrumentations({
        "@opentelemetry/instrumentation-fs": { enabled: false }
      })
    ]
  });

  sdk.start();

  return async () => {
    await sdk.shutdown();
  };
}
