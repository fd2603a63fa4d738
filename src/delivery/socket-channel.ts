import { v4 as uuidv4 } from "uuid";
import type {
  Coordinates,
  DeliveryChannel,
  Language,
  NoticeKind,
  OutgoingMessage,
} from "../tracking/types.js";
import type { MessageCatalog } from "./messages.js";

export interface LiveMessagePayload {
  id: string;
  destinationId: string;
  text: string;
  images?: string[];
  venue?: { latitude: number; longitude: number; title: string };
  timestamp: string;
}

export interface LiveNoticePayload {
  id: string;
  destinationId: string;
  kind: NoticeKind;
  text: string;
  timestamp: string;
}

/** Server -> client events. */
export interface ServerToClientEvents {
  "live:message": (payload: LiveMessagePayload) => void;
  "live:notice": (payload: LiveNoticePayload) => void;
}

/** Client -> server events. */
export interface ClientToServerEvents {
  "live:subscribe": (data: { destinationId: string }) => void;
  "live:position": (data: { userId: string } & Coordinates) => void;
}

/** Room-addressed emitter; index.ts backs it with the socket.io server. */
export interface LiveEmitter {
  message(room: string, payload: LiveMessagePayload): void;
  notice(room: string, payload: LiveNoticePayload): void;
}

/**
 * Delivers live content to the socket.io room named by the destination id.
 * Every client subscribed to that destination receives it.
 */
export class SocketDeliveryChannel implements DeliveryChannel {
  private readonly emitter: LiveEmitter;
  private readonly catalog: MessageCatalog;

  constructor(emitter: LiveEmitter, catalog: MessageCatalog) {
    this.emitter = emitter;
    this.catalog = catalog;
  }

  async deliver(destinationId: string, message: OutgoingMessage): Promise<void> {
    const payload: LiveMessagePayload = {
      id: uuidv4(),
      destinationId,
      text: message.text,
      timestamp: new Date().toISOString(),
      ...(message.images && message.images.length > 0 ? { images: message.images } : {}),
      ...(message.venue
        ? {
            venue: {
              latitude: message.venue.position.latitude,
              longitude: message.venue.position.longitude,
              title: message.venue.title,
            },
          }
        : {}),
    };
    this.emitter.message(destinationId, payload);
  }

  async notify(destinationId: string, kind: NoticeKind, language: Language): Promise<void> {
    this.emitter.notice(destinationId, {
      id: uuidv4(),
      destinationId,
      kind,
      text: this.catalog.notice(language, kind),
      timestamp: new Date().toISOString(),
    });
  }
}
