/**
 * Abstraction for reading the current time.
 * Used to measure how long a polling cycle took.
 */
export interface Clock {
  /** Get current timestamp in milliseconds */
  now(): number;
}
