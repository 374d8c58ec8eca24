// Text Input - queues typed utterances until the dispatcher polls for them
import { Input, Status, StatusNotifier, Token } from '../interfaces';
import { TokenModel } from '../models';
import { BaseComponent } from '../services/BaseComponent';

export class TextInput extends BaseComponent implements Input {
  private pending: Token[][] = [];

  constructor(notifier: StatusNotifier | null, name?: string) {
    super(notifier, name);
  }

  /**
   * Queue some text. Returns the number of tokens queued, which is zero for
   * blank text.
   */
  public push(text: string): number {
    const tokens = TokenModel.fromText(text);
    if (tokens.length === 0) {
      return 0;
    }
    this.pending.push(tokens);
    this.notify(Status.ACTIVE);
    return tokens.length;
  }

  public async read(): Promise<Token[] | null> {
    const tokens = this.pending.shift() ?? null;
    if (this.pending.length === 0) {
      this.notify(Status.IDLE);
    }
    return tokens;
  }

  public getPendingCount(): number {
    return this.pending.length;
  }

  protected async onStop(): Promise<void> {
    this.pending = [];
  }
}
