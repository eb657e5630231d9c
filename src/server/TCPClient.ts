import * as net from 'net';

export interface TCPClientConfig {
  readonly host: string;
  readonly port: number;
  readonly timeout?: number;
}

interface PendingLine {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
}

/**
 * Client for the line protocol. Requests are pipelined: each send() waits
 * for the next response line, in the order the commands were written.
 */
export class TCPClient {
  private readonly config: Required<TCPClientConfig>;
  private socket: net.Socket | null = null;
  private connected: boolean = false;
  private buffer: string = '';
  private welcome: PendingLine | null = null;
  private pendingLines: PendingLine[] = [];

  constructor(config: TCPClientConfig) {
    this.config = {
      timeout: 5000,
      ...config,
    };
  }

  /**
   * Resolves with the server's welcome line.
   */
  public async connect(): Promise<string> {
    if (this.connected || this.socket !== null) {
      throw new Error('TCPClient: Already connected');
    }

    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      this.socket = socket;
      this.welcome = { resolve, reject };

      socket.setEncoding('utf8');
      socket.setTimeout(this.config.timeout);

      socket.on('connect', () => {
        this.connected = true;
      });

      socket.on('data', (chunk: Buffer | string) => {
        this.handleData(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
      });

      socket.on('error', (err) => {
        this.rejectAllPending(err);
      });

      socket.on('close', () => {
        this.connected = false;
        this.socket = null;
        this.rejectAllPending(new Error('Connection closed'));
      });

      socket.on('timeout', () => {
        this.rejectAllPending(new Error('Connection timeout'));
        socket.destroy();
      });

      socket.connect(this.config.port, this.config.host);
    });
  }

  public async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!this.connected || socket === null) {
      return;
    }

    return new Promise((resolve) => {
      socket.once('close', () => resolve());
      socket.end();
    });
  }

  public isConnected(): boolean {
    return this.connected;
  }

  public async send(command: string): Promise<string> {
    const socket = this.ensureConnected();

    const response = new Promise<string>((resolve, reject) => {
      this.pendingLines.push({ resolve, reject });
    });
    socket.write(`${command}\n`);

    return response;
  }

  private handleData(chunk: string): void {
    this.buffer += chunk;

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      this.deliver(line);
      newline = this.buffer.indexOf('\n');
    }
  }

  private deliver(line: string): void {
    if (this.welcome !== null) {
      const welcome = this.welcome;
      this.welcome = null;
      welcome.resolve(line);
      return;
    }

    const pending = this.pendingLines.shift();
    if (pending) {
      pending.resolve(line);
    }
  }

  private rejectAllPending(err: Error): void {
    if (this.welcome !== null) {
      this.welcome.reject(err);
      this.welcome = null;
    }
    for (const pending of this.pendingLines) {
      pending.reject(err);
    }
    this.pendingLines = [];
  }

  private ensureConnected(): net.Socket {
    if (!this.connected || this.socket === null) {
      throw new Error('TCPClient: Not connected');
    }
    return this.socket;
  }
}
