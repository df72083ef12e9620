import * as z from "zod/v4";
import type { Credential } from "../auth/session-types.js";

// --- Response schemas (unknown fields are kept and passed through to the caller) ---

export const LoginResponseSchema = z.looseObject({
  session_token: z.string().optional(),
});

export const ProjectSchema = z.looseObject({
  uid: z.string(),
  label: z.string().optional(),
  created: z.string().optional(),
  role: z.string().nullable().optional(),
});

export const ProjectListSchema = z.looseObject({
  projects: z.array(ProjectSchema).default([]),
});

export const DeviceSchema = z.looseObject({
  uid: z.string(),
  serial_number: z.string().optional(),
  sku: z.string().optional(),
  last_activity: z.string().nullable().optional(),
  fleet_uids: z.array(z.string()).optional(),
});

export const DeviceListSchema = z.looseObject({
  devices: z.array(DeviceSchema).default([]),
  has_more: z.boolean().optional(),
});

export const EventSchema = z.looseObject({
  uid: z.string().optional(),
  device: z.string().optional(),
  file: z.string().optional(),
  when: z.number().optional(),
  body: z.record(z.string(), z.unknown()).optional(),
});

export const EventListSchema = z.looseObject({
  events: z.array(EventSchema).default([]),
  has_more: z.boolean().optional(),
  through: z.string().optional(),
});

export type Project = z.infer<typeof ProjectSchema>;
export type ProjectList = z.infer<typeof ProjectListSchema>;
export type Device = z.infer<typeof DeviceSchema>;
export type DeviceList = z.infer<typeof DeviceListSchema>;
export type NotehubEvent = z.infer<typeof EventSchema>;
export type EventList = z.infer<typeof EventListSchema>;

// --- Request types ---

export interface DeviceFilter {
  deviceUid?: string[];
  tag?: string[];
  serialNumber?: string[];
  fleetUid?: string;
  pageSize?: number;
  pageNum?: number;
}

export interface EventFilter {
  deviceUid?: string[];
  serialNumber?: string[];
  pageSize?: number;
  pageNum?: number;
  notecardFirmware?: string[];
  location?: string[];
  hostFirmware?: string[];
  hostName?: string[];
  productUid?: string[];
  sku?: string[];
  fleetUid?: string;
  /** Comma-separated notefile names, e.g. "_health.qo,data.qo" */
  files?: string;
  /** Comma-separated body fields to return */
  selectFields?: string;
}

export interface NoteInput {
  /** Defaults to DEFAULT_NOTEFILE_ID */
  notefileId?: string;
  body?: Record<string, unknown>;
  /** Base64-encoded binary payload */
  payload?: string;
}

export type NoteAck = {
  projectUid: string;
  deviceUid: string;
  notefileId: string;
  sent: true;
};

/** Inbound queue a Notecard polls for notes from Notehub. */
export const DEFAULT_NOTEFILE_ID = "data.qi";

/**
 * Operations the tools need from Notehub. Every call except login takes a session token.
 */
export interface NotehubGateway {
  login(credential: Credential, signal?: AbortSignal): Promise<string>;
  listProjects(token: string): Promise<ProjectList>;
  listDevices(token: string, projectUid: string, filter?: DeviceFilter): Promise<DeviceList>;
  listEvents(token: string, projectUid: string, filter?: EventFilter): Promise<EventList>;
  sendNote(token: string, projectUid: string, deviceUid: string, note: NoteInput): Promise<NoteAck>;
}
