import { z } from "zod";

export const EnvelopeSchema = z.object({
  type: z.string().min(1),
  payload: z.unknown().optional(),
  request_id: z.string().max(128).optional(),
});

const Empty = z.object({});

export const AuthPayload = z.object({
  display_name: z.string(),
});

export const CreateGamePayload = z.object({
  name: z.string().trim().min(1).max(48).optional(),
  max_players: z.number().int().min(1).max(64).optional(),
});

export const JoinGamePayload = z.object({
  session_id: z.string().min(1),
});

export const ReadyPayload = z.object({
  ready: z.boolean().default(true),
});

export const ActionPayload = z.object({
  action_type: z.string().min(1),
  params: z.unknown().optional(),
});

export const ChatPayload = z.object({
  text: z.string(),
});

export const ReconnectPayload = z.object({
  token: z.string().min(1),
  session_id: z.string().min(1),
});

export const LeaveGamePayload = Empty;
export const PassPayload = Empty;
export const ResyncPayload = Empty;
export const ListGamesPayload = Empty;
