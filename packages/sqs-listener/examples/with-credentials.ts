/**
 * Listen to a queue with static credentials and acknowledge messages by hand.
 *
 * Usage:
 *   AWS_ACCESS_KEY_ID=... AWS_SECRET_ACCESS_KEY=... \
 *   SQS_LISTENER_QUEUE_URL=https://sqs.us-east-1.amazonaws.com/123456789012/my-queue \
 *     npx tsx examples/with-credentials.ts
 */

import {
  ListenerClientBuilder,
  createConfig,
  createListener,
  createLogger,
  createProcessSignalHandler,
  type ListenerClient,
  type Message,
} from "../src/index.js";

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} env variable needs to be present`);
  }
  return value;
}

async function main(): Promise<void> {
  const logger = createLogger({ level: "info", json: false, name: "with-credentials" });
  let client: ListenerClient | undefined;

  const handle = (message: Message) => {
    logger.info("Message received", { messageId: message.id });
    void client?.acknowledge(message).catch((error: unknown) => {
      logger.error("Acknowledge failed", {
        messageId: message.id,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  };

  client = ListenerClientBuilder.fromCredentials({
    region: process.env.AWS_REGION ?? "us-east-1",
    credentials: {
      accessKeyId: requireEnv("AWS_ACCESS_KEY_ID"),
      secretAccessKey: requireEnv("AWS_SECRET_ACCESS_KEY"),
    },
  })
    .listener(createListener(requireEnv("SQS_LISTENER_QUEUE_URL"), handle))
    .config(createConfig({ checkIntervalMs: 10_000, autoAck: false }))
    .logger(logger)
    .build();

  const signals = createProcessSignalHandler();
  const running = client;
  signals.onShutdown(async () => running.stop());

  await running.start();
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
