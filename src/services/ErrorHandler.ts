// Error Handler - records failures per operation and warns on repeats
import { EventEmitter } from 'events';

export interface FailureTracker {
  operationName: string;
  failureCount: number;
  lastFailure: Date | null;
  lastMessage: string;
  warningEmitted: boolean;
}

export interface FailureWarning {
  operationName: string;
  failureCount: number;
  message: string;
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}

export class ErrorHandler extends EventEmitter {
  private failureTrackers: Map<string, FailureTracker> = new Map();
  private readonly FAILURE_WARNING_THRESHOLD = 3;

  constructor() {
    super();
  }

  public recordFailure(operationName: string, error: unknown, context?: string): void {
    const err = toError(error);
    let tracker = this.failureTrackers.get(operationName);

    if (!tracker) {
      tracker = {
        operationName,
        failureCount: 0,
        lastFailure: null,
        lastMessage: '',
        warningEmitted: false
      };
      this.failureTrackers.set(operationName, tracker);
    }

    tracker.failureCount++;
    tracker.lastFailure = new Date();
    tracker.lastMessage = err.message;

    if (context) {
      console.error(`[${operationName}] Error (count: ${tracker.failureCount}): ${context}:`, err.message);
    } else {
      console.error(`[${operationName}] Error (count: ${tracker.failureCount}):`, err.message);
    }
    this.emit('error_recorded', { operationName, error: err.message, context, count: tracker.failureCount });

    if (tracker.failureCount >= this.FAILURE_WARNING_THRESHOLD && !tracker.warningEmitted) {
      tracker.warningEmitted = true;
      const warning: FailureWarning = {
        operationName,
        failureCount: tracker.failureCount,
        message: `Operation "${operationName}" has failed ${tracker.failureCount} times`
      };
      this.emit('warning', warning);
    }
  }

  public recordSuccess(operationName: string): void {
    const tracker = this.failureTrackers.get(operationName);
    if (tracker) {
      tracker.failureCount = 0;
      tracker.warningEmitted = false;
    }
  }

  public getFailureCount(operationName: string): number {
    return this.failureTrackers.get(operationName)?.failureCount ?? 0;
  }

  public resetFailures(operationName: string): void {
    this.failureTrackers.delete(operationName);
  }

  public resetAllFailures(): void {
    this.failureTrackers.clear();
  }

  public getFailureStats(): FailureTracker[] {
    return Array.from(this.failureTrackers.values()).map(tracker => ({ ...tracker }));
  }
}
