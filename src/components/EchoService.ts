// Echo Service - repeats back whatever follows "say" or "repeat"
import { Handler, Result, Service, StatusNotifier, Token } from '../interfaces';
import { BaseComponent, BaseHandler } from '../services/BaseComponent';
import { KeyPhraseMatcher } from '../services/KeyPhraseMatcher';

const TRIGGERS = new Set(['say', 'repeat']);

class EchoHandler extends BaseHandler {
  public async handle(): Promise<Result | null> {
    const text = this.tokens.slice(1).map(token => token.element).join(' ');
    return this.createResult(text);
  }
}

export class EchoService extends BaseComponent implements Service {
  private readonly belief: number;

  constructor(notifier: StatusNotifier | null, belief: number = 0.5) {
    super(notifier);
    this.belief = belief;
  }

  public async evaluate(tokens: readonly Token[]): Promise<Handler | null> {
    const words = KeyPhraseMatcher.wordsOf(tokens);
    if (words.length < 2 || !TRIGGERS.has(words[0])) {
      return null;
    }
    return new EchoHandler(this, tokens, this.belief);
  }
}
