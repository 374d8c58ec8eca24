// Console Output - prints responses to stdout
import { Output, Status, StatusNotifier } from '../interfaces';
import { BaseComponent } from '../services/BaseComponent';

export class ConsoleOutput extends BaseComponent implements Output {
  private readonly prefix: string;

  constructor(notifier: StatusNotifier | null, prefix: string = '> ') {
    super(notifier);
    this.prefix = prefix;
  }

  public async write(text: string): Promise<void> {
    this.notify(Status.WORKING);
    try {
      console.log(`${this.prefix}${text}`);
    } finally {
      this.notify(Status.IDLE);
    }
  }
}
