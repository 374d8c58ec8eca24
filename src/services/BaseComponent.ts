// Base Component - shared lifecycle and status reporting for pluggable parts
import { v4 as uuidv4 } from 'uuid';
import { Component, Handler, Result, Service, Status, StatusNotifier, Token } from '../interfaces';
import { ResultModel } from '../models';

export abstract class BaseComponent implements Component {
  public readonly id: string;
  public readonly name: string;
  private status: Status = Status.INITIALIZING;
  private stopped: boolean = false;
  private readonly notifier: StatusNotifier | null;

  constructor(notifier: StatusNotifier | null, name?: string) {
    this.id = uuidv4();
    this.name = name ?? this.constructor.name;
    this.notifier = notifier;
    this.notifier?.update(this, this.status);
  }

  public async start(): Promise<void> {
    await this.onStart();
    this.notify(Status.IDLE);
  }

  public async stop(): Promise<void> {
    try {
      await this.onStop();
    } finally {
      this.stopped = true;
    }
  }

  public getStatus(): Status {
    return this.status;
  }

  public isStopped(): boolean {
    return this.stopped;
  }

  // One-time setup; may throw, which aborts system startup
  protected async onStart(): Promise<void> {}

  protected async onStop(): Promise<void> {}

  protected notify(status: Status): void {
    if (this.stopped || status === this.status) {
      return;
    }
    this.status = status;
    this.notifier?.update(this, status);
  }

  public toString(): string {
    return this.name;
  }
}

export abstract class BaseHandler implements Handler {
  public readonly service: Service;
  public readonly tokens: readonly Token[];
  public readonly belief: number;
  protected readonly isExclusive: boolean;

  constructor(service: Service, tokens: readonly Token[], belief: number, isExclusive: boolean = false) {
    this.service = service;
    this.tokens = tokens;
    this.belief = belief;
    this.isExclusive = isExclusive;
  }

  public abstract handle(): Promise<Result | null>;

  protected createResult(text: string | null, isQuery: boolean = false): Result {
    return new ResultModel(this, text, isQuery, this.isExclusive);
  }

  public toString(): string {
    return `${this.constructor.name}(belief=${this.belief})`;
  }
}
