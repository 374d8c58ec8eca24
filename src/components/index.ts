// Built-in components and their registry identifiers
import { ComponentRegistry } from '../services/ComponentRegistry';
import { ConsoleOutput } from './ConsoleOutput';
import { EchoService } from './EchoService';
import {
  booleanOption,
  numberOption,
  optionalStringOption,
  requiredNumberOption,
  stringMapOption,
  stringOption
} from './options';
import { PhraseReplyService } from './PhraseReplyService';
import { PurpleAirService } from './PurpleAirService';
import { TextInput } from './TextInput';
import { WebSocketOutput } from './WebSocketOutput';

export * from './TextInput';
export * from './ConsoleOutput';
export * from './WebSocketOutput';
export * from './EchoService';
export * from './PhraseReplyService';
export * from './PurpleAirService';

export function registerBuiltinComponents(registry: ComponentRegistry): ComponentRegistry {
  return registry
    .registerInput('text', (notifier, options) =>
      new TextInput(notifier, optionalStringOption(options, 'name')))
    .registerOutput('console', (notifier, options) =>
      new ConsoleOutput(notifier, stringOption(options, 'prefix', '> ')))
    .registerOutput('websocket', (notifier, options) =>
      new WebSocketOutput(notifier, numberOption(options, 'port', 3001)))
    .registerService('echo', (notifier, options) =>
      new EchoService(notifier, numberOption(options, 'belief', 0.5)))
    .registerService('phrase-reply', (notifier, options) =>
      new PhraseReplyService(notifier, stringMapOption(options, 'replies'), {
        belief: numberOption(options, 'belief', 0.8),
        exclusive: booleanOption(options, 'exclusive', true)
      }))
    .registerService('purpleair', (notifier, options) =>
      new PurpleAirService(notifier, requiredNumberOption(options, 'sensorId'), {
        baseUrl: optionalStringOption(options, 'baseUrl'),
        cacheTtlMs: numberOption(options, 'cacheTtlMs', 60000)
      }));
}

export function createDefaultRegistry(): ComponentRegistry {
  return registerBuiltinComponents(new ComponentRegistry());
}
