/**
 * Herald — Chat Room Source
 *
 * Reads the most recent messages of one Matrix room through the
 * client-server API (`/rooms/{roomId}/messages`, newest first).
 */

import { z } from 'zod';
import type { RawActivity } from '../../types';
import { firstLine, type SourceAdapter } from '../base';

const PAGE_SIZE = 100;

const RoomEventSchema = z.object({
  event_id: z.string(),
  type: z.string(),
  sender: z.string(),
  origin_server_ts: z.number(),
  content: z
    .object({
      msgtype: z.string().optional(),
      body: z.unknown().optional(),
    })
    .passthrough(),
});

const MessagesResponseSchema = z.object({
  chunk: z.array(z.unknown()),
});

export interface ChatSourceOptions {
  homeserver: string;
  accessToken: string;
  roomId: string;
}

export class MatrixChatSource implements SourceAdapter {
  readonly source = 'chat' as const;

  constructor(private readonly options: ChatSourceOptions) {}

  async collect(since: Date): Promise<RawActivity[]> {
    const { homeserver, accessToken, roomId } = this.options;
    const url =
      `${homeserver.replace(/\/$/, '')}/_matrix/client/v3/rooms/${encodeURIComponent(roomId)}/messages` +
      `?dir=b&limit=${PAGE_SIZE}`;

    const res = await fetch(url, {
      headers: { Authorization: `Bearer ${accessToken}` },
    });

    if (!res.ok) {
      throw new Error(`Matrix messages request failed: ${res.status}`);
    }

    const body = MessagesResponseSchema.parse(await res.json());
    const activities: RawActivity[] = [];

    for (const raw of body.chunk) {
      const parsed = RoomEventSchema.safeParse(raw);
      // State events and redactions are not messages
      if (!parsed.success) continue;

      const event = parsed.data;
      if (event.type !== 'm.room.message' || typeof event.content.body !== 'string') continue;

      const occurredAt = new Date(event.origin_server_ts);
      if (occurredAt < since) continue;

      activities.push(toActivity(event.event_id, event.sender, event.content.body, occurredAt, roomId));
    }

    return activities;
  }
}

function toActivity(eventId: string, sender: string, body: string, occurredAt: Date, roomId: string): RawActivity {
  return {
    source: 'chat',
    sourceNativeId: eventId,
    payload: {
      kind: 'message',
      title: firstLine(body) || `Message from ${sender}`,
      text: body,
      actor: sender,
      link: `https://matrix.to/#/${encodeURIComponent(roomId)}/${encodeURIComponent(eventId)}`,
      occurredAt: occurredAt.toISOString(),
    },
  };
}
