import dotenv from 'dotenv';
import path from 'path';

// Load env vars before anything else
dotenv.config();
dotenv.config({ path: path.resolve(__dirname, '../.env'), override: true });

import { LangfuseSpanProcessor } from '@langfuse/otel';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { setLangfuseTracerProvider } from '@langfuse/tracing';
import { isLangfuseConfigured, loadEnv } from './config/env';

/**
 * Langfuse tracing over OpenTelemetry.
 *
 * The @langfuse/langchain CallbackHandler creates spans through @langfuse/tracing;
 * they are only exported once a TracerProvider with the LangfuseSpanProcessor is
 * registered. The provider is Langfuse-specific, not the global OTel provider.
 */
const env = loadEnv();

export const langfuseEnabled = isLangfuseConfigured(env);

export const spanProcessor = langfuseEnabled
  ? new LangfuseSpanProcessor({
      publicKey: env.LANGFUSE_PUBLIC_KEY,
      secretKey: env.LANGFUSE_SECRET_KEY,
      baseUrl: env.LANGFUSE_HOST,
    })
  : null;

if (spanProcessor) {
  const provider = new NodeTracerProvider({
    spanProcessors: [spanProcessor],
  });
  setLangfuseTracerProvider(provider);
  console.log('LangFuse: TracerProvider initialized with LangfuseSpanProcessor');
} else {
  console.log('LangFuse: keys not configured, tracing disabled');
}
