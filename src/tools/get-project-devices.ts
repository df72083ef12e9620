import * as z from "zod/v4";
import { DeviceListSchema, type DeviceFilter, type DeviceList } from "../notehub/types.js";
import type { ToolContext } from "../types.js";
import { CredentialInput, requireFields, withSession, type CredentialParams } from "./session-call.js";

export const GetProjectDevicesInput = {
  ...CredentialInput,
  projectUid: z.string().min(1).meta({ description: "UID of the Notehub project, e.g. app:2606f411-dea6-44a0-9743-1130f57d77d8" }),
  deviceUid: z.array(z.string().min(1)).optional().meta({ description: "Only these device UIDs" }),
  tag: z.array(z.string().min(1)).optional().meta({ description: "Only devices carrying these tags" }),
  serialNumber: z.array(z.string().min(1)).optional().meta({ description: "Only devices with these serial numbers" }),
  fleetUid: z.string().min(1).optional().meta({ description: "Only devices in this fleet" }),
  pageSize: z.number().int().min(1).max(500).optional().meta({ description: "Devices per page" }),
  pageNum: z.number().int().min(1).optional().meta({ description: "Page to return, starting at 1" }),
};

export const GetProjectDevicesOutput = DeviceListSchema.shape;

export interface GetProjectDevicesParams extends CredentialParams, DeviceFilter {
  projectUid: string;
}

export async function getProjectDevices(params: GetProjectDevicesParams, ctx: ToolContext): Promise<DeviceList> {
  requireFields({ projectUid: params.projectUid });
  const { username: _username, password: _password, projectUid, ...filter } = params;
  return withSession(ctx, "get-project-devices", params, (token) =>
    ctx.gateway.listDevices(token, projectUid, filter)
  );
}

export function summarizeDevices(projectUid: string, result: DeviceList): string {
  const more = result.has_more ? "\nMore devices are available on the next page." : "";
  if (result.devices.length === 0) {
    return `No devices matched in project ${projectUid}.${more}`;
  }
  const lines = result.devices.map((device) => {
    const serial = device.serial_number ? ` "${device.serial_number}"` : "";
    const seen = device.last_activity ? `, last seen ${device.last_activity}` : "";
    return `- ${device.uid}${serial}${seen}`;
  });
  return `Found ${result.devices.length} device(s) in project ${projectUid}:\n${lines.join("\n")}${more}`;
}
