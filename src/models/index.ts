// Data models for the voice command dispatcher
import { v4 as uuidv4 } from 'uuid';
import {
  Token,
  Handler,
  Result,
  Configuration,
  ComponentsConfiguration,
  ComponentSpec,
  ComponentOptions,
  DispatchRecord
} from '../interfaces';
import { KeyPhraseMatcher } from '../services/KeyPhraseMatcher';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class TokenModel implements Token {
  public element: string;
  public startTime?: number;
  public endTime?: number;
  public probability?: number;

  constructor(element: string, probability?: number, startTime?: number, endTime?: number) {
    this.element = element;
    this.probability = probability;
    this.startTime = startTime;
    this.endTime = endTime;
  }

  public toString(): string {
    return this.element;
  }

  // Whitespace tokenization for text that arrives untokenized
  public static fromText(text: string): TokenModel[] {
    return text
      .split(/\s+/)
      .filter(word => word.length > 0)
      .map(word => new TokenModel(word, 1.0));
  }
}

export class ResultModel implements Result {
  public readonly handler: Handler;
  public readonly text: string | null;
  public readonly isQuery: boolean;
  public readonly isExclusive: boolean;

  constructor(handler: Handler, text: string | null, isQuery: boolean, isExclusive: boolean) {
    this.handler = handler;
    this.text = text;
    this.isQuery = isQuery;
    this.isExclusive = isExclusive;
  }
}

export class DispatchRecordModel implements DispatchRecord {
  public id: string;
  public timestamp: Date;
  public words: string[];
  public offset: number | null;
  public handlerCount: number;
  public response: string | null;

  constructor(words: string[], offset: number | null, handlerCount: number, response: string | null) {
    this.id = uuidv4();
    this.timestamp = new Date();
    this.words = words;
    this.offset = offset;
    this.handlerCount = handlerCount;
    this.response = response;
  }

  public toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      timestamp: this.timestamp.toISOString(),
      words: [...this.words],
      offset: this.offset,
      handlerCount: this.handlerCount,
      response: this.response
    };
  }
}

export class ConfigurationModel implements Configuration {
  public keyPhrases: string[];
  public components: ComponentsConfiguration;
  public pollIntervalMs: number;
  public httpPort: number;

  constructor() {
    // Default configuration
    this.keyPhrases = ['Hey Computer'];
    this.components = { inputs: [], outputs: [], services: [] };
    this.pollIntervalMs = 100;
    this.httpPort = 3000;
  }

  public toJSON(): Configuration {
    return {
      keyPhrases: [...this.keyPhrases],
      components: {
        inputs: this.components.inputs.map(copySpec),
        outputs: this.components.outputs.map(copySpec),
        services: this.components.services.map(copySpec)
      },
      pollIntervalMs: this.pollIntervalMs,
      httpPort: this.httpPort
    };
  }

  public static fromJSON(data: unknown): ConfigurationModel {
    const config = new ConfigurationModel();
    if (!isRecord(data)) {
      return config;
    }

    if (Array.isArray(data.keyPhrases)) {
      config.keyPhrases = data.keyPhrases.filter((p): p is string => typeof p === 'string');
    }
    if (typeof data.pollIntervalMs === 'number') {
      config.pollIntervalMs = data.pollIntervalMs;
    }
    if (typeof data.httpPort === 'number') {
      config.httpPort = data.httpPort;
    }
    if (isRecord(data.components)) {
      config.components = {
        inputs: parseSpecs(data.components.inputs, 'inputs'),
        outputs: parseSpecs(data.components.outputs, 'outputs'),
        services: parseSpecs(data.components.services, 'services')
      };
    }
    return config;
  }

  public validate(): string[] {
    const errors: string[] = [];

    if (this.keyPhrases.length === 0) {
      errors.push('At least one key phrase is required');
    }

    for (const phrase of this.keyPhrases) {
      if (KeyPhraseMatcher.parseKeyPhrase(phrase).length === 0) {
        errors.push(`Key phrase "${phrase}" has no letters and can never match`);
      }
    }

    if (!(this.pollIntervalMs > 0)) {
      errors.push('Poll interval must be greater than 0ms');
    }

    if (!Number.isInteger(this.httpPort) || this.httpPort < 0 || this.httpPort > 65535) {
      errors.push('HTTP port must be an integer between 0 and 65535');
    }

    return errors;
  }
}

function copySpec([id, options]: ComponentSpec): ComponentSpec {
  return [id, options === null ? null : { ...options }];
}

function parseSpecs(value: unknown, section: string): ComponentSpec[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    console.warn(`Config components.${section} is not a list, ignoring it`);
    return [];
  }

  const specs: ComponentSpec[] = [];
  for (const entry of value) {
    const spec = parseSpec(entry);
    if (spec) {
      specs.push(spec);
    } else {
      console.warn(`Ignoring malformed entry in components.${section}: ${JSON.stringify(entry)}`);
    }
  }
  return specs;
}

function parseSpec(entry: unknown): ComponentSpec | null {
  if (!Array.isArray(entry) || entry.length < 1 || entry.length > 2) return null;
  const [id, options] = entry;
  if (typeof id !== 'string' || id.trim() === '') return null;
  if (options === undefined || options === null) return [id, null];
  if (!isRecord(options)) return null;
  const copy: ComponentOptions = { ...options };
  return [id, copy];
}
