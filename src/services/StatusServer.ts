// Status Server - HTTP view onto a running dispatcher, plus typed utterances
import express from 'express';
import { Server } from 'http';
import { TextInput } from '../components/TextInput';
import { isRecord } from '../models';
import { Dispatcher } from './Dispatcher';
import { LoggingNotifier } from './LoggingNotifier';

export class StatusServer {
  private app: express.Application;
  private server: Server | null = null;
  private readonly dispatcher: Dispatcher;

  constructor(dispatcher: Dispatcher) {
    this.dispatcher = dispatcher;
    this.app = express();
    this.app.use(express.json());
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get('/health', (req, res) => {
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        running: this.dispatcher.isRunning()
      });
    });

    this.app.get('/status', (req, res) => {
      const notifier = this.dispatcher.getNotifier();
      const observed = notifier instanceof LoggingNotifier;
      res.json({
        running: this.dispatcher.isRunning(),
        keyPhrases: this.dispatcher.getKeyPhrases().map(phrase => phrase.join(' ')),
        stats: this.dispatcher.getStats(),
        lastDispatch: this.dispatcher.getLastDispatch()?.toJSON() ?? null,
        busy: observed ? notifier.isBusy() : null,
        components: observed
          ? notifier.getStatuses().map(entry => ({ ...entry, since: entry.since.toISOString() }))
          : []
      });
    });

    this.app.get('/errors', (req, res) => {
      res.json({
        failures: this.dispatcher.getErrorHandler().getFailureStats()
      });
    });

    this.app.post('/utterance', (req, res) => {
      const body: unknown = req.body;
      const text = isRecord(body) ? body.text : undefined;
      const inputName = isRecord(body) ? body.input : undefined;

      if (typeof text !== 'string' || text.trim() === '') {
        res.status(400).json({ error: 'text must be a non-empty string' });
        return;
      }

      const input = this.findTextInput(typeof inputName === 'string' ? inputName : undefined);
      if (!input) {
        res.status(404).json({ error: 'No matching text input is configured' });
        return;
      }

      const tokens = input.push(text);
      res.status(202).json({ input: input.name, tokens });
    });
  }

  private findTextInput(name?: string): TextInput | undefined {
    return this.dispatcher
      .getInputs()
      .filter((input): input is TextInput => input instanceof TextInput)
      .find(input => name === undefined || input.name === name);
  }

  public start(port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        console.log(`Status server running on http://localhost:${this.getPort()}`);
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  public getPort(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : 0;
  }

  public stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      server.close((error) => {
        this.server = null;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
