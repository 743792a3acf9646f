/**
 * Transport Types
 *
 * The publish/subscribe session the engine talks through. Connection,
 * reconnection back-off and QoS belong to the implementation.
 */

export type TransportEvent =
  | { type: 'connect' }
  | { type: 'reconnect' }
  | { type: 'close' }
  | { type: 'offline' }
  | { type: 'error'; error: Error }
  | { type: 'message'; topic: string; payload: Buffer };

export type TransportEventHandler = (event: TransportEvent) => void;

export interface DeviceTransport {
  /** Whether the session is currently established */
  readonly connected: boolean;

  /** Begin connecting. Outcome arrives as `connect`, `error` or `close` events. */
  connect(): void;

  /** Close the session. */
  end(): Promise<void>;

  subscribe(topics: string[]): void;

  /** Fire-and-forget publish; failures arrive as `error` events. */
  publish(topic: string, payload: string): void;

  /** Register an event handler. Returns a function that removes it. */
  onEvent(handler: TransportEventHandler): () => void;
}
