import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  DeleteMessageCommand,
  ReceiveMessageCommand,
  SQSClient,
} from "@aws-sdk/client-sqs";
import { mockClient } from "aws-sdk-client-mock";
import { ListenerClientBuilder } from "./builder.js";
import { createConfig } from "./config.js";
import { createNoopLogger } from "./logger.js";
import { createListener } from "./types.js";
import type { QueueService } from "./ports/queue-service.js";

const QUEUE_URL = "https://sqs.us-east-1.amazonaws.com/000000000000/events";

const sqsMock = mockClient(SQSClient);

const noopService: QueueService = {
  receive: async () => ({ messages: [] }),
  deleteMessage: async () => {},
};

async function flush(): Promise<void> {
  for (let i = 0; i < 50; i++) await Promise.resolve();
}

describe("ListenerClientBuilder", () => {
  beforeEach(() => {
    sqsMock.reset();
  });

  describe("build", () => {
    it("builds from a region with a listener", () => {
      const client = ListenerClientBuilder.fromRegion("us-east-1")
        .listener(createListener(QUEUE_URL, () => {}))
        .build();

      expect(client.getStatus()).toBe("created");
    });

    it("builds with explicit credentials and a config", () => {
      const client = ListenerClientBuilder.fromCredentials({
        region: "us-east-1",
        credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" },
      })
        .listener(createListener(QUEUE_URL, () => {}))
        .config(createConfig({ checkIntervalMs: 1000, autoAck: false }))
        .build();

      expect(client.getStatus()).toBe("created");
    });

    it("fails when the listener is missing", () => {
      const builder = ListenerClientBuilder.fromQueueService(noopService);

      expect(() => builder.build()).toThrow(
        expect.objectContaining({
          code: "BUILDER_VALIDATION",
          message: "`listener` must be initialized",
        })
      );
    });

    it("fails when the queue service is missing", () => {
      const builder = new ListenerClientBuilder().listener(createListener(QUEUE_URL, () => {}));

      expect(() => builder.build()).toThrow(
        expect.objectContaining({
          code: "BUILDER_VALIDATION",
          message: "`service` must be initialized",
        })
      );
    });
  });

  describe("with a mocked SQS client", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("receives, dispatches and deletes through the SDK", async () => {
      sqsMock.on(ReceiveMessageCommand).resolves({
        Messages: [
          { MessageId: "m1", Body: "first", ReceiptHandle: "h1" },
          { MessageId: "m2", Body: "second", ReceiptHandle: "h2" },
        ],
      });
      sqsMock.on(DeleteMessageCommand).resolves({});
      const bodies: string[] = [];

      const client = ListenerClientBuilder.fromSqsClient(new SQSClient({ region: "us-east-1" }))
        .listener(createListener(QUEUE_URL, (m) => bodies.push(m.body)))
        .config(createConfig({ checkIntervalMs: 10_000 }))
        .logger(createNoopLogger())
        .build();
      const done = client.start();

      await vi.advanceTimersByTimeAsync(10_000);
      await flush();
      client.stop();
      await done;

      expect(bodies).toEqual(["first", "second"]);
      expect(sqsMock.commandCalls(ReceiveMessageCommand)[0].args[0].input).toEqual({
        QueueUrl: QUEUE_URL,
      });
      expect(
        sqsMock.commandCalls(DeleteMessageCommand).map((call) => call.args[0].input)
      ).toEqual([
        { QueueUrl: QUEUE_URL, ReceiptHandle: "h1" },
        { QueueUrl: QUEUE_URL, ReceiptHandle: "h2" },
      ]);
    });

    it("uses the injected timer service", () => {
      const timers = {
        setTimeout: vi.fn((fn: () => void, ms: number) => setTimeout(fn, ms)),
        clearTimeout: vi.fn((id: NodeJS.Timeout) => clearTimeout(id)),
      };

      const client = ListenerClientBuilder.fromQueueService(noopService)
        .listener(createListener(QUEUE_URL, () => {}))
        .config(createConfig({ checkIntervalMs: 2500 }))
        .logger(createNoopLogger())
        .timers(timers)
        .build();
      void client.start();
      client.stop();

      expect(timers.setTimeout).toHaveBeenCalledWith(expect.any(Function), 2500);
      expect(timers.clearTimeout).toHaveBeenCalledTimes(1);
    });
  });
});
