import { SQSClient, type SQSClientConfig } from "@aws-sdk/client-sqs";
import type { Clock } from "./ports/clock.js";
import type { QueueService } from "./ports/queue-service.js";
import type { TimerService } from "./ports/timer.js";
import { createConfig, type ListenerConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import type { Listener } from "./types.js";
import { createSqsQueueService } from "./adapters/sqs-queue-service.js";
import { createListenerClient, type ListenerClient } from "./listener-client.js";
import { missingBuilderField } from "./errors/catalog.js";

export interface CredentialsOptions {
  region: string;
  credentials: NonNullable<SQSClientConfig["credentials"]>;
  /** Custom HTTP handler, e.g. one with tuned timeouts or a proxy */
  requestHandler?: SQSClientConfig["requestHandler"];
}

/**
 * Builds a ListenerClient.
 *
 * ```ts
 * const client = ListenerClientBuilder.fromRegion("us-east-1")
 *   .listener(createListener(queueUrl, (message) => console.log(message.body)))
 *   .config(createConfig({ checkIntervalMs: 10_000 }))
 *   .build();
 *
 * await client.start();
 * ```
 */
export class ListenerClientBuilder {
  private listenerValue?: Listener;
  private configValue: ListenerConfig = createConfig();
  private loggerValue?: Logger;
  private timersValue?: TimerService;
  private clockValue?: Clock;

  constructor(private readonly service?: QueueService) {}

  /** Use the default credential chain for the given region */
  static fromRegion(region: string): ListenerClientBuilder {
    return ListenerClientBuilder.fromSqsClient(new SQSClient({ region }));
  }

  /** Use explicit credentials, region and, optionally, request handler */
  static fromCredentials(options: CredentialsOptions): ListenerClientBuilder {
    return ListenerClientBuilder.fromSqsClient(
      new SQSClient({
        region: options.region,
        credentials: options.credentials,
        requestHandler: options.requestHandler,
      })
    );
  }

  static fromSqsClient(client: SQSClient): ListenerClientBuilder {
    return new ListenerClientBuilder(createSqsQueueService(client));
  }

  static fromQueueService(service: QueueService): ListenerClientBuilder {
    return new ListenerClientBuilder(service);
  }

  /** Add the listener. Required. */
  listener(listener: Listener): this {
    this.listenerValue = listener;
    return this;
  }

  config(config: ListenerConfig): this {
    this.configValue = config;
    return this;
  }

  logger(logger: Logger): this {
    this.loggerValue = logger;
    return this;
  }

  timers(timers: TimerService): this {
    this.timersValue = timers;
    return this;
  }

  clock(clock: Clock): this {
    this.clockValue = clock;
    return this;
  }

  /**
   * Build the client.
   * Throws BUILDER_VALIDATION when the queue service or listener is missing.
   */
  build(): ListenerClient {
    if (!this.service) {
      throw missingBuilderField("service");
    }
    if (!this.listenerValue) {
      throw missingBuilderField("listener");
    }

    return createListenerClient({
      service: this.service,
      listener: this.listenerValue,
      config: this.configValue,
      logger:
        this.loggerValue ??
        createLogger({ level: "info", json: false, name: "sqs-listener" }),
      timers: this.timersValue,
      clock: this.clockValue,
    });
  }
}
