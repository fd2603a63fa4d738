import { vi } from "vitest";
import { MessageCatalog } from "../../delivery/messages.js";
import type {
  ContentRequest,
  ContentResult,
  Coordinates,
  DeliveryChannel,
  Language,
  NoticeKind,
  OutgoingMessage,
} from "../types.js";
import type { SessionRegistry } from "../registry.js";

export const catalog = MessageCatalog.fromFile();

export const START: Coordinates = { latitude: 48.8566, longitude: 2.3522 };

export interface RecordedDelivery {
  at: number;
  destinationId: string;
  message: OutgoingMessage;
}

export interface RecordedNotice {
  at: number;
  destinationId: string;
  kind: NoticeKind;
  language: Language;
}

/** In-memory channel that records what it was asked to send. */
export class RecordingChannel implements DeliveryChannel {
  deliveries: RecordedDelivery[] = [];
  notices: RecordedNotice[] = [];
  failDeliveries = false;

  async deliver(destinationId: string, message: OutgoingMessage): Promise<void> {
    if (this.failDeliveries) throw new Error("channel down");
    this.deliveries.push({ at: Date.now(), destinationId, message });
  }

  async notify(destinationId: string, kind: NoticeKind, language: Language): Promise<void> {
    this.notices.push({ at: Date.now(), destinationId, kind, language });
  }
}

export function fact(place: string): ContentResult {
  return { place, summary: `Fact about ${place}`, raw: "" };
}

/** Generator returning the given places in order, then repeating the last. */
export function placesGenerator(places: string[]) {
  let i = 0;
  return vi.fn(async (_request: ContentRequest): Promise<ContentResult> => {
    const place = places[Math.min(i, places.length - 1)];
    i++;
    return fact(place);
  });
}

/**
 * Advance fake time by `totalMs`, reporting a position every `stepMs` so the
 * session never looks silent.
 */
export async function runWithUpdates(
  registry: SessionRegistry,
  userId: string,
  totalMs: number,
  position: Coordinates = START,
  stepMs = 60_000
): Promise<void> {
  let remaining = totalMs;
  while (remaining > 0) {
    const step = Math.min(stepMs, remaining);
    await vi.advanceTimersByTimeAsync(step);
    remaining -= step;
    await registry.updatePosition(userId, position);
  }
}

/** Channel whose deliveries (and optionally notices) are recorded but never settle. */
export class HangingChannel extends RecordingChannel {
  signals: Array<AbortSignal | undefined> = [];
  hangNotices = false;

  deliver(destinationId: string, message: OutgoingMessage, signal?: AbortSignal): Promise<void> {
    this.deliveries.push({ at: Date.now(), destinationId, message });
    this.signals.push(signal);
    return new Promise<void>(() => {});
  }

  notify(destinationId: string, kind: NoticeKind, language: Language, signal?: AbortSignal): Promise<void> {
    if (!this.hangNotices) return super.notify(destinationId, kind, language);
    this.notices.push({ at: Date.now(), destinationId, kind, language });
    this.signals.push(signal);
    return new Promise<void>(() => {});
  }
}
