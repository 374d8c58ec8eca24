// Core interfaces for the voice command dispatcher

export enum Status {
  INITIALIZING = 'INITIALIZING',
  IDLE = 'IDLE',
  ACTIVE = 'ACTIVE',
  WORKING = 'WORKING'
}

export interface Token {
  element: string;
  startTime?: number;
  endTime?: number;
  probability?: number;
}

export type KeyPhrase = readonly string[];

export interface StatusNotifier {
  update(component: Component, status: Status): void;
}

export interface Component {
  readonly id: string;
  readonly name: string;
  getStatus(): Status;
  start(): Promise<void>;
  stop(): Promise<void>;
  toString(): string;
}

export interface Input extends Component {
  /** Non-blocking; resolves to null when nothing is pending. */
  read(): Promise<Token[] | null>;
}

export interface Output extends Component {
  write(text: string): Promise<void>;
}

export interface Service extends Component {
  evaluate(tokens: readonly Token[]): Promise<Handler | null>;
}

export interface Handler {
  readonly service: Service;
  readonly tokens: readonly Token[];
  readonly belief: number;
  handle(): Promise<Result | null>;
}

export interface Result {
  readonly handler: Handler;
  readonly text: string | null;
  readonly isQuery: boolean;
  readonly isExclusive: boolean;
}

export type ComponentOptions = Record<string, unknown>;

// [identifier, options] as written in config.json
export type ComponentSpec = [string, ComponentOptions | null];

export interface ComponentsConfiguration {
  inputs: ComponentSpec[];
  outputs: ComponentSpec[];
  services: ComponentSpec[];
}

export interface Configuration {
  keyPhrases: string[];
  components: ComponentsConfiguration;
  pollIntervalMs: number;
  httpPort: number;
}

export interface DispatchStats {
  batches: number;
  ignored: number;
  apologies: number;
  responses: number;
}

export interface DispatchRecord {
  id: string;
  timestamp: Date;
  words: string[];
  offset: number | null;
  handlerCount: number;
  response: string | null;
}

export interface ConfigurationManager {
  loadConfiguration(): Promise<Configuration>;
  getConfiguration(): Configuration;
}
