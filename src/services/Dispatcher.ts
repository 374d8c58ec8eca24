// Dispatcher - polls inputs, routes key-phrased commands to services, answers via outputs
import { EventEmitter } from 'events';
import {
  Component,
  Configuration,
  DispatchStats,
  Handler,
  Input,
  KeyPhrase,
  Output,
  Service,
  StatusNotifier,
  Token
} from '../interfaces';
import { DispatchRecordModel } from '../models';
import { ComponentRegistry } from './ComponentRegistry';
import { ErrorHandler } from './ErrorHandler';
import { KeyPhraseMatcher } from './KeyPhraseMatcher';
import { LoggingNotifier } from './LoggingNotifier';

export const APOLOGY = "I'm sorry, I don't know how to help with that";

export interface DispatcherOptions {
  notifier: StatusNotifier;
  keyPhrases: readonly string[];
  inputs?: Input[];
  outputs?: Output[];
  services?: Service[];
  pollIntervalMs?: number;
  errorHandler?: ErrorHandler;
}

export class Dispatcher extends EventEmitter {
  private readonly notifier: StatusNotifier;
  private readonly matcher: KeyPhraseMatcher;
  private readonly inputs: readonly Input[];
  private readonly outputs: readonly Output[];
  private readonly services: readonly Service[];
  private readonly pollIntervalMs: number;
  private readonly errorHandler: ErrorHandler;

  private running: boolean = true;
  private hasRun: boolean = false;
  private shutdownComplete: boolean = false;
  private wakeUp: (() => void) | null = null;
  private stats: DispatchStats = { batches: 0, ignored: 0, apologies: 0, responses: 0 };
  private lastDispatch: DispatchRecordModel | null = null;

  constructor(options: DispatcherOptions) {
    super();
    this.notifier = options.notifier;
    this.matcher = new KeyPhraseMatcher(options.keyPhrases);
    this.inputs = Object.freeze([...(options.inputs ?? [])]);
    this.outputs = Object.freeze([...(options.outputs ?? [])]);
    this.services = Object.freeze([...(options.services ?? [])]);
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
  }

  /**
   * Build a dispatcher, and all of its components, from configuration. The
   * components share the dispatcher's notifier.
   */
  public static fromConfiguration(
    config: Configuration,
    registry: ComponentRegistry,
    options: { notifier?: StatusNotifier; errorHandler?: ErrorHandler } = {}
  ): Dispatcher {
    const notifier = options.notifier ?? new LoggingNotifier();
    const { inputs, outputs, services } = config.components;

    return new Dispatcher({
      notifier,
      keyPhrases: config.keyPhrases,
      inputs: inputs.map(spec => registry.createInput(spec, notifier)),
      outputs: outputs.map(spec => registry.createOutput(spec, notifier)),
      services: services.map(spec => registry.createService(spec, notifier)),
      pollIntervalMs: config.pollIntervalMs,
      errorHandler: options.errorHandler
    });
  }

  public async run(): Promise<void> {
    if (this.hasRun) {
      throw new Error('Dispatcher has already been run');
    }
    this.hasRun = true;

    console.log('Starting the system');
    await this.startComponents();
    this.emitSafely('started');

    console.log('Entering main loop');
    while (this.running) {
      for (const input of this.inputs) {
        // Stop requests are honoured between reads only
        if (!this.running) break;

        const tokens = await this.readFrom(input);
        if (tokens === null) continue;

        console.log(`Read from ${input}: ${JSON.stringify(tokens.map(token => token.element))}`);
        const response = await this.handle(tokens);
        if (response !== null) {
          await this.respond(response);
        }
      }

      if (this.running) {
        await this.sleep(this.pollIntervalMs);
      }
    }

    console.log('Stopping the system');
    await this.stopComponents();
    this.emitSafely('stopped');
  }

  public stop(): void {
    if (!this.running) return;
    this.running = false;
    this.wake();
  }

  public interrupt(): void {
    console.warn('Interrupt received');
    this.stop();
  }

  /**
   * Route one batch of tokens. Resolves to the text to give back to the user,
   * or null when there is nothing to say.
   */
  public async handle(tokens: readonly Token[]): Promise<string | null> {
    this.stats.batches++;

    const words = KeyPhraseMatcher.wordsOf(tokens);
    const offset = this.matcher.findOffset(words);
    if (offset === null) {
      console.log(`Key phrases ${this.matcher} not found in ${JSON.stringify(words)}`);
      this.stats.ignored++;
      this.emitSafely('key_phrase_missing', { words });
      this.recordCycle(words, null, 0, null);
      return null;
    }

    const command = tokens.slice(offset);
    const handlers: Handler[] = [];
    for (const service of this.services) {
      const handler = await this.evaluateWith(service, command);
      if (handler !== null) {
        handlers.push(handler);
      }
    }

    if (handlers.length === 0) {
      this.stats.apologies++;
      this.recordCycle(words, offset, 0, APOLOGY);
      return APOLOGY;
    }

    // Highest belief first; Array.prototype.sort is stable so ties keep service order
    const ranked = [...handlers].sort((a, b) => b.belief - a.belief);

    let response = '';
    for (const handler of ranked) {
      try {
        const result = await handler.handle();
        this.errorHandler.recordSuccess('handler');
        if (result === null) continue;

        if (result.text) {
          response += result.text;
        }

        if (result.isExclusive) break;
      } catch (error) {
        this.errorHandler.recordFailure(
          'handler',
          error,
          `Handler ${handler} with tokens ${JSON.stringify(handler.tokens.map(t => t.element))} for service ${handler.service}`
        );
      }
    }

    const text = response.length > 0 ? response : null;
    this.recordCycle(words, offset, handlers.length, text);
    return text;
  }

  /**
   * Hand a response to every output. One output failing does not stop the
   * others from getting it.
   */
  public async respond(response: string | null): Promise<void> {
    if (!response) return;

    this.stats.responses++;
    for (const output of this.outputs) {
      try {
        await output.write(response);
        this.errorHandler.recordSuccess('output_write');
      } catch (error) {
        this.errorHandler.recordFailure('output_write', error, `Failed to respond with ${output}`);
      }
    }
  }

  public isRunning(): boolean {
    return this.running;
  }

  public getStats(): DispatchStats {
    return { ...this.stats };
  }

  public getLastDispatch(): DispatchRecordModel | null {
    return this.lastDispatch;
  }

  public getNotifier(): StatusNotifier {
    return this.notifier;
  }

  public getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  public getKeyPhrases(): readonly KeyPhrase[] {
    return this.matcher.getKeyPhrases();
  }

  public getInputs(): readonly Input[] {
    return this.inputs;
  }

  public getOutputs(): readonly Output[] {
    return this.outputs;
  }

  public getServices(): readonly Service[] {
    return this.services;
  }

  private allComponents(): Component[] {
    return [...this.inputs, ...this.outputs, ...this.services];
  }

  private async startComponents(): Promise<void> {
    const started: Component[] = [];
    for (const component of this.allComponents()) {
      console.log(`Starting ${component}`);
      try {
        await component.start();
        started.push(component);
      } catch (error) {
        // Fatal: never run with some components unstarted
        console.error(`Failed to start ${component}:`, error);
        this.running = false;
        this.shutdownComplete = true;
        await this.stopEach(started);
        throw error;
      }
    }
  }

  private async stopComponents(): Promise<void> {
    if (this.shutdownComplete) return;
    this.shutdownComplete = true;
    await this.stopEach(this.allComponents());
  }

  private async stopEach(components: Component[]): Promise<void> {
    for (const component of components) {
      try {
        console.log(`Stopping ${component}`);
        await component.stop();
      } catch (error) {
        this.errorHandler.recordFailure('component_stop', error, `Failed to stop ${component}`);
      }
    }
  }

  private async readFrom(input: Input): Promise<Token[] | null> {
    try {
      const tokens = await input.read();
      this.errorHandler.recordSuccess('input_read');
      return tokens && tokens.length > 0 ? tokens : null;
    } catch (error) {
      this.errorHandler.recordFailure('input_read', error, `Failed to read from ${input}`);
      return null;
    }
  }

  private async evaluateWith(service: Service, tokens: Token[]): Promise<Handler | null> {
    try {
      const handler = await service.evaluate(tokens);
      this.errorHandler.recordSuccess('service_evaluate');
      return handler;
    } catch (error) {
      this.errorHandler.recordFailure('service_evaluate', error, `Service ${service} failed to evaluate`);
      return null;
    }
  }

  private recordCycle(words: string[], offset: number | null, handlerCount: number, response: string | null): void {
    this.lastDispatch = new DispatchRecordModel(words, offset, handlerCount, response);
    this.emitSafely('cycle_complete', this.lastDispatch);
  }

  // Listeners run inside the loop, so their errors are logged rather than thrown
  private emitSafely(event: string, ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      console.error(`Listener for ${event} failed:`, error);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wakeUp = null;
        resolve();
      }, ms);
      this.wakeUp = () => {
        clearTimeout(timer);
        this.wakeUp = null;
        resolve();
      };
    });
  }

  private wake(): void {
    this.wakeUp?.();
  }
}
