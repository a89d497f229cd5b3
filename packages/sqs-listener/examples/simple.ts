/**
 * Listen to a queue using the default credential chain.
 *
 * Usage:
 *   SQS_LISTENER_QUEUE_URL=https://sqs.us-east-1.amazonaws.com/123456789012/my-queue \
 *     npx tsx examples/simple.ts
 */

import {
  ListenerClientBuilder,
  configFromEnv,
  createListener,
  createLogger,
  createProcessSignalHandler,
  resolveConfig,
  toListenerConfig,
} from "../src/index.js";

async function main(): Promise<void> {
  const settings = resolveConfig(configFromEnv());
  if (!settings.queueUrl) {
    throw new Error("SQS_LISTENER_QUEUE_URL needs to be set");
  }

  const logger = createLogger({ level: settings.logLevel, json: settings.logJson, name: "simple" });
  const listener = createListener(settings.queueUrl, (message) => {
    logger.info("Message received", { messageId: message.id, body: message.body });
  });

  const client = ListenerClientBuilder.fromRegion(settings.region ?? "us-east-1")
    .listener(listener)
    .config(toListenerConfig(settings))
    .logger(logger)
    .build();

  const signals = createProcessSignalHandler();
  signals.onShutdown(async () => client.stop());

  await client.start();
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
