/**
 * WebSocket Transport Layer
 *
 * Handles connection to the relay server, joining rooms,
 * and sending/receiving peer payloads.
 */

import WebSocket from 'ws';
import { z } from 'zod';

// ============================================
// Relay -> Client Frames
// ============================================

const JoinedFrameSchema = z.object({
  type: z.literal('joined'),
  room: z.string(),
  clientId: z.string(),
  memberCount: z.number().int().nonnegative(),
});

const PeerJoinedFrameSchema = z.object({
  type: z.literal('peer_joined'),
  room: z.string(),
  clientId: z.string(),
  memberCount: z.number().int().nonnegative(),
});

const MsgFrameSchema = z.object({
  type: z.literal('msg'),
  room: z.string(),
  from: z.string(),
  payload: z.unknown(),
});

const ErrorFrameSchema = z.object({
  type: z.literal('error'),
  code: z.string(),
  message: z.string(),
});

export const RelayFrameSchema = z.discriminatedUnion('type', [
  JoinedFrameSchema,
  PeerJoinedFrameSchema,
  MsgFrameSchema,
  ErrorFrameSchema,
]);

export type RelayFrame = z.infer<typeof RelayFrameSchema>;

export interface TransportCallbacks {
  onJoined: (clientId: string, memberCount: number) => void;
  onPeerJoined: (peerId: string, memberCount: number) => void;
  onPeerPayload: (payload: unknown) => void;
  onError: (error: Error) => void;
  onClose: () => void;
}

export class Transport {
  private ws: WebSocket;
  private room: string;
  private callbacks: TransportCallbacks;
  private clientId: string | null = null;

  constructor(relayUrl: string, room: string, callbacks: TransportCallbacks) {
    this.room = room;
    this.callbacks = callbacks;
    this.ws = new WebSocket(relayUrl);

    this.ws.on('open', () => this.handleOpen());
    this.ws.on('message', (data) => this.handleMessage(data.toString()));
    this.ws.on('error', (err) => this.callbacks.onError(err));
    this.ws.on('close', () => this.callbacks.onClose());
  }

  private handleOpen() {
    this.ws.send(JSON.stringify({ type: 'join', room: this.room }));
  }

  private handleMessage(data: string) {
    let frame: RelayFrame;
    try {
      frame = RelayFrameSchema.parse(JSON.parse(data));
    } catch (err) {
      this.callbacks.onError(
        new Error(`Failed to parse relay message: ${err instanceof Error ? err.message : String(err)}`)
      );
      return;
    }

    switch (frame.type) {
      case 'joined':
        this.clientId = frame.clientId;
        this.callbacks.onJoined(frame.clientId, frame.memberCount);
        break;

      case 'peer_joined':
        this.callbacks.onPeerJoined(frame.clientId, frame.memberCount);
        break;

      case 'msg':
        this.callbacks.onPeerPayload(frame.payload);
        break;

      case 'error':
        this.callbacks.onError(new Error(`Relay error [${frame.code}]: ${frame.message}`));
        break;
    }
  }

  /**
   * Send a payload to all peers in the room
   */
  sendPayload(payload: unknown) {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new Error('WebSocket is not open');
    }

    this.ws.send(JSON.stringify({ type: 'msg', room: this.room, payload }));
  }

  /**
   * Close the connection
   */
  close() {
    this.ws.close();
  }

  /**
   * Get the client ID assigned by the relay
   */
  getClientId(): string | null {
    return this.clientId;
  }
}
