import * as z from "zod/v4";
import { EventListSchema, type EventFilter, type EventList } from "../notehub/types.js";
import type { ToolContext } from "../types.js";
import { CredentialInput, requireFields, withSession, type CredentialParams } from "./session-call.js";

const stringList = (description: string) =>
  z.array(z.string().min(1)).optional().meta({ description });

export const GetProjectEventsInput = {
  ...CredentialInput,
  projectUid: z.string().min(1).meta({ description: "UID of the Notehub project" }),
  deviceUid: stringList("Only events from these device UIDs"),
  serialNumber: stringList("Only events from devices with these serial numbers"),
  pageSize: z.number().int().min(1).max(1000).optional().meta({ description: "Events per page (default 50)" }),
  pageNum: z.number().int().min(1).optional().meta({ description: "Page to return (default 1)" }),
  notecardFirmware: stringList("Only events from these Notecard firmware versions"),
  location: stringList("Only events from devices at these locations"),
  hostFirmware: stringList("Only events from these host firmware versions"),
  hostName: stringList("Only events from these host names"),
  productUid: stringList("Only events for these product UIDs"),
  sku: stringList("Only events from Notecards with these SKUs"),
  fleetUid: z.string().min(1).optional().meta({ description: "Only events from devices in this fleet" }),
  files: z.string().min(1).optional().meta({ description: 'Comma-separated notefiles, e.g. "_health.qo,data.qo"' }),
  selectFields: z.string().min(1).optional().meta({ description: "Comma-separated body fields to return" }),
};

export const GetProjectEventsOutput = EventListSchema.shape;

export interface GetProjectEventsParams extends CredentialParams, EventFilter {
  projectUid: string;
}

export async function getProjectEvents(params: GetProjectEventsParams, ctx: ToolContext): Promise<EventList> {
  requireFields({ projectUid: params.projectUid });
  const { username: _username, password: _password, projectUid, ...filter } = params;
  return withSession(ctx, "get-project-events", params, (token) =>
    ctx.gateway.listEvents(token, projectUid, filter)
  );
}

export function summarizeEvents(projectUid: string, result: EventList): string {
  const count = result.events.length;
  const files = new Map<string, number>();
  for (const event of result.events) {
    const file = event.file ?? "(unknown)";
    files.set(file, (files.get(file) ?? 0) + 1);
  }
  const breakdown = [...files.entries()].map(([file, n]) => `${file}: ${n}`).join(", ");
  const more = result.has_more ? " More events are available on the next page." : "";
  if (count === 0) {
    return `No events matched in project ${projectUid}.${more}`;
  }
  return `Found ${count} event(s) in project ${projectUid} (${breakdown}).${more}`;
}
