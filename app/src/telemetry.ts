import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-node';

export const SERVICE_NAME = 'drive-backup';

/**
 * Start the OpenTelemetry SDK exporting cycle spans over OTLP.
 * Returns null when no endpoint is configured; spans are then no-ops.
 */
export function initTelemetry(endpoint: string | null): NodeSDK | null {
  if (!endpoint) return null;

  const sdk = new NodeSDK({
    resource: new Resource({ [ATTR_SERVICE_NAME]: SERVICE_NAME }),
    spanProcessor: new BatchSpanProcessor(new OTLPTraceExporter({ url: endpoint })),
  });
  sdk.start();
  return sdk;
}

/** Flush pending spans. Safe to call with null. */
export async function shutdownTelemetry(sdk: NodeSDK | null): Promise<void> {
  if (!sdk) return;
  await sdk.shutdown();
}
