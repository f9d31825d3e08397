import { isDroppable, type ServerMessage } from "./protocol";

/** The slice of a `ws` socket the queue writes to. */
export interface OutboundSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  terminate(): void;
}

const OPEN = 1;

export type OutboundQueueOptions = {
  limit: number;
  onDrop?: (msg: ServerMessage) => void;
  onOverflow?: (pending: number) => void;
};

/**
 * Per-connection send buffer with one write in flight. Past `limit` the oldest
 * droppable message is shed; at four times the limit the socket is
 * terminated and the client is expected to reconnect for a full snapshot.
 */
export class OutboundQueue {
  private readonly pending: ServerMessage[] = [];
  private inFlight = false;
  private closed = false;
  private droppedCount = 0;

  constructor(
    private readonly socket: OutboundSocket,
    private readonly opts: OutboundQueueOptions
  ) {}

  get length(): number {
    return this.pending.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  push(msg: ServerMessage): void {
    if (this.closed || this.socket.readyState !== OPEN) return;
    this.pending.push(msg);

    if (this.pending.length > this.opts.limit) this.shed();
    if (this.pending.length >= this.opts.limit * 4) {
      const pending = this.pending.length;
      this.close();
      this.opts.onOverflow?.(pending);
      this.socket.terminate();
      return;
    }
    this.flush();
  }

  close(): void {
    this.closed = true;
    this.pending.length = 0;
  }

  private shed(): void {
    const idx = this.pending.findIndex(isDroppable);
    if (idx < 0) return;
    const [msg] = this.pending.splice(idx, 1);
    this.droppedCount++;
    if (msg) this.opts.onDrop?.(msg);
  }

  private flush(): void {
    if (this.inFlight || this.closed) return;
    const next = this.pending.shift();
    if (!next) return;
    if (this.socket.readyState !== OPEN) {
      this.close();
      return;
    }

    this.inFlight = true;
    this.socket.send(JSON.stringify(next), (err) => {
      this.inFlight = false;
      if (err) {
        this.close();
        return;
      }
      this.flush();
    });
  }
}
