// Phrase Reply Service - fixed replies to configured command phrases
import { Handler, KeyPhrase, Result, Service, Status, StatusNotifier, Token } from '../interfaces';
import { BaseComponent, BaseHandler } from '../services/BaseComponent';
import { KeyPhraseMatcher } from '../services/KeyPhraseMatcher';

export interface PhraseReplyOptions {
  belief?: number;
  exclusive?: boolean;
}

interface PhraseReply {
  phrase: KeyPhrase;
  reply: string;
}

class PhraseReplyHandler extends BaseHandler {
  private readonly owner: PhraseReplyService;
  private readonly reply: string;

  constructor(service: PhraseReplyService, tokens: readonly Token[], reply: string, belief: number, exclusive: boolean) {
    super(service, tokens, belief, exclusive);
    this.owner = service;
    this.reply = reply;
  }

  public async handle(): Promise<Result | null> {
    this.owner.markWorking();
    try {
      return this.createResult(this.reply);
    } finally {
      this.owner.markIdle();
    }
  }
}

export class PhraseReplyService extends BaseComponent implements Service {
  private readonly replies: PhraseReply[] = [];
  private readonly belief: number;
  private readonly exclusive: boolean;

  constructor(notifier: StatusNotifier | null, replies: Map<string, string>, options: PhraseReplyOptions = {}) {
    super(notifier);
    this.belief = options.belief ?? 0.8;
    this.exclusive = options.exclusive ?? true;

    for (const [text, reply] of replies) {
      const phrase = KeyPhraseMatcher.parseKeyPhrase(text);
      if (phrase.length === 0) {
        console.warn(`${this.name}: phrase "${text}" has no letters, ignoring it`);
        continue;
      }
      this.replies.push({ phrase, reply });
    }
  }

  public async evaluate(tokens: readonly Token[]): Promise<Handler | null> {
    const words = KeyPhraseMatcher.wordsOf(tokens);
    for (const { phrase, reply } of this.replies) {
      if (words.length >= phrase.length && KeyPhraseMatcher.listIndex(words, phrase) === 0) {
        return new PhraseReplyHandler(this, tokens, reply, this.belief, this.exclusive);
      }
    }
    return null;
  }

  public markWorking(): void {
    this.notify(Status.WORKING);
  }

  public markIdle(): void {
    this.notify(Status.IDLE);
  }
}
