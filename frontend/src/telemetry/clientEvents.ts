type ClientEventType = "turn_start" | "turn_done" | "turn_error" | "models_unavailable";

export type ClientEvent = {
  type: ClientEventType;
  turnId?: string;
  model?: string;
  code?: string;
  durationMs?: number;
};

type RecordedEvent = ClientEvent & { ts: string };

const MAX_BUFFER = 200;

let buffer: RecordedEvent[] = [];
let overflowWarned = false;

export function emitClientEvent(event: ClientEvent): void {
  console.info("[client-event]", event);

  if (buffer.length >= MAX_BUFFER) {
    buffer.shift();
    if (!overflowWarned) {
      overflowWarned = true;
      console.warn("[client-event] buffer full, dropping oldest events");
    }
  }
  buffer.push({ ...event, ts: new Date().toISOString() });
}

/** Newest last. Exposed for the debug console and tests. */
export function recentClientEvents(): readonly RecordedEvent[] {
  return buffer;
}

export function __resetClientEventsForTest(): void {
  buffer = [];
  overflowWarned = false;
}
