import {
  DeleteMessageCommand,
  ReceiveMessageCommand,
  type Message as SqsMessage,
  type MessageAttributeValue,
  type SQSClient,
} from "@aws-sdk/client-sqs";
import type { QueueService } from "../ports/queue-service.js";
import type { Message, MessageAttribute } from "../types.js";

function toAttribute(value: MessageAttributeValue): MessageAttribute {
  return {
    dataType: value.DataType ?? "String",
    stringValue: value.StringValue,
    binaryValue: value.BinaryValue,
  };
}

/**
 * Map an SDK message to the listener's message shape.
 */
export function toMessage(message: SqsMessage): Message {
  const attributes: Record<string, string> = {};
  for (const [name, value] of Object.entries(message.Attributes ?? {})) {
    if (typeof value === "string") attributes[name] = value;
  }

  const messageAttributes: Record<string, MessageAttribute> = {};
  for (const [name, value] of Object.entries(message.MessageAttributes ?? {})) {
    messageAttributes[name] = toAttribute(value);
  }

  return {
    id: message.MessageId ?? "",
    body: message.Body ?? "",
    receiptHandle: message.ReceiptHandle,
    attributes,
    messageAttributes,
  };
}

/**
 * Queue service backed by Amazon SQS.
 * Receives use the queue's own defaults (batch size, wait time, visibility).
 */
export function createSqsQueueService(client: SQSClient): QueueService {
  return {
    async receive(queueUrl) {
      const output = await client.send(new ReceiveMessageCommand({ QueueUrl: queueUrl }));
      return { messages: output.Messages?.map(toMessage) };
    },

    async deleteMessage(queueUrl, receiptHandle) {
      await client.send(
        new DeleteMessageCommand({ QueueUrl: queueUrl, ReceiptHandle: receiptHandle })
      );
    },
  };
}
