/** Emitted once a source has opened, together with its boundary. */
export interface SourceOpenedEvent {
  readonly type: 'source:opened';
  readonly sourceName: string;
  readonly sourceIndex: number;
  readonly timestamp: number;
}

/** Emitted when a source reaches its clean end. */
export interface SourceCompletedEvent {
  readonly type: 'source:completed';
  readonly sourceName: string;
  readonly sourceIndex: number;
  /** Bytes of this source delivered to the consumer. */
  readonly bytesRead: number;
  readonly timestamp: number;
}

/**
 * Emitted when a source fails. `open` and `read` failures abort the stream;
 * `release` failures happen while closing a handle and only surface here.
 */
export interface SourceFailedEvent {
  readonly type: 'source:failed';
  readonly sourceName: string;
  readonly sourceIndex: number;
  readonly phase: 'open' | 'read' | 'release';
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted after the last source completed and end-of-stream was signalled. */
export interface StreamCompletedEvent {
  readonly type: 'stream:completed';
  readonly sourceCount: number;
  readonly bytesRead: number;
  readonly timestamp: number;
}

/** Emitted the first time `close()` is called. */
export interface StreamClosedEvent {
  readonly type: 'stream:closed';
  readonly bytesRead: number;
  readonly timestamp: number;
}

/** Emitted when the multiplexer's external signal aborts. */
export interface StreamCancelledEvent {
  readonly type: 'stream:cancelled';
  readonly bytesRead: number;
  readonly timestamp: number;
}

/** Emitted when a decoder adopts its canonical header. */
export interface HeaderEstablishedEvent {
  readonly type: 'header:established';
  readonly names: readonly string[];
  /** `true` when the header was read from the stream, `false` when configured. */
  readonly inferred: boolean;
  readonly timestamp: number;
}

/** Emitted for each redundant per-source header row that was discarded. */
export interface HeaderSkippedEvent {
  readonly type: 'header:skipped';
  readonly sourceName: string;
  readonly sourceIndex: number;
  readonly timestamp: number;
}

/** Emitted when a decoder reaches clean end-of-stream. */
export interface DecodeCompletedEvent {
  readonly type: 'decode:completed';
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted when a decoder enters its sticky failed state. */
export interface DecodeFailedEvent {
  readonly type: 'decode:failed';
  readonly recordCount: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of every event emitted by sourcemux components. */
export type DomainEvent =
  | SourceOpenedEvent
  | SourceCompletedEvent
  | SourceFailedEvent
  | StreamCompletedEvent
  | StreamClosedEvent
  | StreamCancelledEvent
  | HeaderEstablishedEvent
  | HeaderSkippedEvent
  | DecodeCompletedEvent
  | DecodeFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
