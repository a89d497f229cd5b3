export { systemClock } from "./system-clock.js";
export { realTimerService } from "./real-timers.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { createSqsQueueService, toMessage } from "./sqs-queue-service.js";
