// WebSocket Output - broadcasts responses to every connected client
import WebSocket, { WebSocketServer } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { Output, Status, StatusNotifier } from '../interfaces';
import { BaseComponent } from '../services/BaseComponent';

export interface WebSocketMessage {
  type: 'ack' | 'response';
  payload: Record<string, unknown>;
  timestamp: number;
}

export class WebSocketOutput extends BaseComponent implements Output {
  private wss: WebSocketServer | null = null;
  private clients: Map<string, WebSocket> = new Map();
  private readonly port: number;

  constructor(notifier: StatusNotifier | null, port: number) {
    super(notifier);
    this.port = port;
  }

  protected onStart(): Promise<void> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port: this.port });

      wss.on('connection', (socket: WebSocket) => {
        this.handleConnection(socket);
      });

      wss.once('error', reject);

      wss.once('listening', () => {
        wss.off('error', reject);
        wss.on('error', (error) => {
          console.error(`${this.name} server error:`, error);
        });
        this.wss = wss;
        console.log(`${this.name} listening on port ${this.getPort()}`);
        resolve();
      });
    });
  }

  protected onStop(): Promise<void> {
    return new Promise((resolve) => {
      for (const clientId of Array.from(this.clients.keys())) {
        this.cleanupConnection(clientId);
      }

      if (this.wss) {
        this.wss.close(() => {
          this.wss = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  public async write(text: string): Promise<void> {
    this.notify(Status.WORKING);
    try {
      const message: WebSocketMessage = {
        type: 'response',
        payload: { text },
        timestamp: Date.now()
      };
      for (const clientId of this.clients.keys()) {
        this.sendToClient(clientId, message);
      }
    } finally {
      this.notify(Status.IDLE);
    }
  }

  public getPort(): number {
    const address = this.wss?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.port;
  }

  public getClientCount(): number {
    return this.clients.size;
  }

  private handleConnection(socket: WebSocket): void {
    const clientId = uuidv4();
    this.clients.set(clientId, socket);

    socket.on('close', () => {
      this.clients.delete(clientId);
    });

    socket.on('error', (error) => {
      console.error(`WebSocket error for client ${clientId}:`, error);
    });

    this.sendToClient(clientId, { type: 'ack', payload: { clientId }, timestamp: Date.now() });
  }

  private sendToClient(clientId: string, message: WebSocketMessage): boolean {
    const socket = this.clients.get(clientId);
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return false;
    }

    try {
      socket.send(JSON.stringify(message));
      return true;
    } catch (error) {
      console.error(`Failed to send message to client ${clientId}:`, error);
      return false;
    }
  }

  private cleanupConnection(clientId: string): void {
    const socket = this.clients.get(clientId);
    if (!socket) return;

    if (socket.readyState === WebSocket.OPEN) {
      socket.close();
    }
    this.clients.delete(clientId);
  }
}
