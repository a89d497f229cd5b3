import { describe, it, expect, beforeEach } from "vitest";
import {
  DeleteMessageCommand,
  ReceiveMessageCommand,
  SQSClient,
} from "@aws-sdk/client-sqs";
import { mockClient } from "aws-sdk-client-mock";
import { createSqsQueueService, toMessage } from "./sqs-queue-service.js";

const QUEUE_URL = "https://sqs.us-east-1.amazonaws.com/000000000000/payments";

const sqsMock = mockClient(SQSClient);

describe("sqs queue service", () => {
  beforeEach(() => {
    sqsMock.reset();
  });

  describe("toMessage", () => {
    it("maps ids, body, handle and attributes", () => {
      const message = toMessage({
        MessageId: "m-1",
        Body: '{"amount":12}',
        ReceiptHandle: "rh-1",
        Attributes: { ApproximateReceiveCount: "3" },
        MessageAttributes: {
          tenant: { DataType: "String", StringValue: "acme" },
        },
      });

      expect(message).toEqual({
        id: "m-1",
        body: '{"amount":12}',
        receiptHandle: "rh-1",
        attributes: { ApproximateReceiveCount: "3" },
        messageAttributes: {
          tenant: { dataType: "String", stringValue: "acme", binaryValue: undefined },
        },
      });
    });

    it("keeps a missing receipt handle absent", () => {
      const message = toMessage({ MessageId: "m-2" });

      expect(message.receiptHandle).toBeUndefined();
      expect(message.body).toBe("");
      expect(message.attributes).toEqual({});
    });
  });

  describe("receive", () => {
    it("sends one ReceiveMessage for the queue with no other options", async () => {
      sqsMock.on(ReceiveMessageCommand).resolves({
        Messages: [{ MessageId: "m-1", Body: "hello", ReceiptHandle: "rh-1" }],
      });
      const service = createSqsQueueService(new SQSClient({ region: "us-east-1" }));

      const result = await service.receive(QUEUE_URL);

      expect(result.messages?.map((m) => m.id)).toEqual(["m-1"]);
      expect(sqsMock.commandCalls(ReceiveMessageCommand)).toHaveLength(1);
      expect(sqsMock.commandCalls(ReceiveMessageCommand)[0].args[0].input).toEqual({
        QueueUrl: QUEUE_URL,
      });
    });

    it("returns no message list when the response has none", async () => {
      sqsMock.on(ReceiveMessageCommand).resolves({});
      const service = createSqsQueueService(new SQSClient({ region: "us-east-1" }));

      const result = await service.receive(QUEUE_URL);

      expect(result.messages).toBeUndefined();
    });

    it("propagates SDK failures", async () => {
      sqsMock.on(ReceiveMessageCommand).rejects(new Error("AccessDenied"));
      const service = createSqsQueueService(new SQSClient({ region: "us-east-1" }));

      await expect(service.receive(QUEUE_URL)).rejects.toThrow("AccessDenied");
    });
  });

  describe("deleteMessage", () => {
    it("sends DeleteMessage with the receipt handle", async () => {
      sqsMock.on(DeleteMessageCommand).resolves({});
      const service = createSqsQueueService(new SQSClient({ region: "us-east-1" }));

      await service.deleteMessage(QUEUE_URL, "rh-9");

      expect(sqsMock.commandCalls(DeleteMessageCommand)[0].args[0].input).toEqual({
        QueueUrl: QUEUE_URL,
        ReceiptHandle: "rh-9",
      });
    });
  });
});
