import * as z from "zod/v4";
import { DEFAULT_NOTEFILE_ID, type NoteAck } from "../notehub/types.js";
import type { ToolContext } from "../types.js";
import { CredentialInput, requireFields, withSession, type CredentialParams } from "./session-call.js";

export const SendNoteInput = {
  ...CredentialInput,
  projectUid: z.string().min(1).meta({ description: "UID of the Notehub project" }),
  deviceUid: z.string().min(1).meta({ description: "UID of the target device, e.g. dev:864475044204278" }),
  notefileId: z.string().min(1).optional().meta({ description: `Notefile to add the note to (default "${DEFAULT_NOTEFILE_ID}")` }),
  body: z.record(z.string(), z.unknown()).optional().meta({ description: "JSON body of the note" }),
  payload: z.string().optional().meta({ description: "Base64-encoded binary payload" }),
};

export const SendNoteOutput = {
  projectUid: z.string(),
  deviceUid: z.string(),
  notefileId: z.string(),
  sent: z.literal(true),
};

export interface SendNoteParams extends CredentialParams {
  projectUid: string;
  deviceUid: string;
  notefileId?: string;
  body?: Record<string, unknown>;
  payload?: string;
}

export async function sendNote(params: SendNoteParams, ctx: ToolContext): Promise<NoteAck> {
  requireFields({ projectUid: params.projectUid, deviceUid: params.deviceUid });
  const { projectUid, deviceUid, notefileId, payload } = params;
  // A note with neither body nor payload still needs a JSON body
  const body = params.body ?? (payload === undefined ? {} : undefined);
  return withSession(ctx, "send-note", params, (token) =>
    ctx.gateway.sendNote(token, projectUid, deviceUid, { notefileId, body, payload })
  );
}

export function summarizeNote(ack: NoteAck): string {
  return `Note added to ${ack.notefileId} on device ${ack.deviceUid} in project ${ack.projectUid}.`;
}
