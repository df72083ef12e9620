export interface ToolMetadata {
  title: string;
  description: {
    part1_purpose: string;
    part2_returns: string;
    part3_useCase: string;
    part4_constraints: string;
  };
  examples: {
    scenario: string;
    description: string;
  }[];
}

export const TOOL_METADATA = {
  "get-projects": {
    title: "List Notehub Projects",
    description: {
      part1_purpose: "List every Notehub project the account can see.",
      part2_returns: "Returns each project's UID, label, creation time and the account's role.",
      part3_useCase: "Use first to find the projectUid the other tools need.",
      part4_constraints: "Requires the Notehub account email and password on every call; the server reuses the login session between calls."
    },
    examples: [
      {
        scenario: "Project discovery",
        description: "Find the UID of the project named \"Cold Chain Monitor\""
      }
    ]
  } as const satisfies ToolMetadata,

  "get-project-devices": {
    title: "List Project Devices",
    description: {
      part1_purpose: "List the devices of one Notehub project, optionally filtered by device UID, tag, serial number or fleet.",
      part2_returns: "Returns device records (UID, serial number, SKU, last activity, fleets) and whether more pages exist.",
      part3_useCase: "Use to check which devices exist, when they last reported, or to find a deviceUid for send-note.",
      part4_constraints: "Filters combine; list filters match any of the given values. Results are paged."
    },
    examples: [
      {
        scenario: "Fleet inventory",
        description: "List the devices in one fleet and when each was last seen"
      }
    ]
  } as const satisfies ToolMetadata,

  "get-project-events": {
    title: "List Project Events",
    description: {
      part1_purpose: "List events (notes received from devices and Notehub system events) for one project.",
      part2_returns: "Returns event records with notefile, device, time and body, plus paging markers.",
      part3_useCase: "Use to inspect sensor readings, device health (_health.qo) or session activity (_session.qo).",
      part4_constraints: "Defaults to 50 events on page 1. Narrow with files and selectFields to keep responses small."
    },
    examples: [
      {
        scenario: "Latest readings",
        description: "Fetch recent data.qo events for one device and read the temperature field"
      },
      {
        scenario: "Health check",
        description: "List _health.qo events across a fleet to spot devices with low battery"
      }
    ]
  } as const satisfies ToolMetadata,

  "send-note": {
    title: "Send Note to Device",
    description: {
      part1_purpose: "Add a note to a notefile on a device, to be delivered on its next sync.",
      part2_returns: "Returns an acknowledgement naming the project, device and notefile.",
      part3_useCase: "Use to push configuration or commands to a Notecard.",
      part4_constraints: "Writes to a real device queue. Defaults to the data.qi inbound notefile; inbound notefile names end in .qi."
    },
    examples: [
      {
        scenario: "Remote command",
        description: "Send {\"led\": \"on\"} to data.qi on one device"
      }
    ]
  } as const satisfies ToolMetadata,
} as const;

export type ToolName = keyof typeof TOOL_METADATA;

export function getToolDescription(toolName: ToolName): string {
  const meta = TOOL_METADATA[toolName];
  const { part1_purpose, part2_returns, part3_useCase, part4_constraints } = meta.description;
  return `${part1_purpose} ${part2_returns} ${part3_useCase} ${part4_constraints}`;
}
