/**
 * Lifecycle shared by the network front ends (TCP text protocol, HTTP API).
 */
export interface IServer {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;

  /** Bound port once started; the configured port before that. */
  getPort(): number;
}
