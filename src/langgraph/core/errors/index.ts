/**
 * Raised when a caller passes a value outside its allowed set (priority level,
 * analytics timeframe, malformed email context). Thrown before any state changes.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Raised when a synchronous mutation is attempted while a request is still running
 * the graph. Queue the mutation with `EmailAssistant.runExclusive` instead.
 */
export class AssistantBusyError extends Error {
  constructor(operation: string) {
    super(`Cannot run "${operation}" while a request is in progress. Use runExclusive() to queue it.`);
    this.name = "AssistantBusyError";
  }
}
