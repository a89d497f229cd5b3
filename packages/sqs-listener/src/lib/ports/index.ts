export type { Clock } from "./clock.js";
export type { TimerService } from "./timer.js";
export type { SignalHandler } from "./signal-handler.js";
export type { QueueService, ReceiveResult } from "./queue-service.js";
