import { describe, it, expect, vi, beforeEach } from "vitest";
import { SessionCache } from "../../src/auth/session-cache.js";
import type { NotehubGateway } from "../../src/notehub/types.js";
import { AuthenticationError, TransientError, ValidationError } from "../../src/shared/errors.js";
import { Logger } from "../../src/shared/logger.js";
import {
  getProjects,
  getProjectDevices,
  getProjectEvents,
  sendNote,
  summarizeProjects,
  summarizeDevices,
  summarizeEvents,
  summarizeNote,
} from "../../src/tools/index.js";
import { requireFields } from "../../src/tools/session-call.js";
import type { ToolContext } from "../../src/types.js";

const CREDS = { username: "ops@example.com", password: "test-password" };

function fakeGateway() {
  return {
    login: vi.fn<NotehubGateway["login"]>(),
    listProjects: vi.fn<NotehubGateway["listProjects"]>(),
    listDevices: vi.fn<NotehubGateway["listDevices"]>(),
    listEvents: vi.fn<NotehubGateway["listEvents"]>(),
    sendNote: vi.fn<NotehubGateway["sendNote"]>(),
  } satisfies NotehubGateway;
}

describe("tools", () => {
  let gateway: ReturnType<typeof fakeGateway>;
  let logs: Array<Record<string, unknown>>;
  let ctx: ToolContext;

  beforeEach(() => {
    gateway = fakeGateway();
    logs = [];
    const logger = new Logger({
      level: "debug",
      sink: (line) => {
        logs.push(JSON.parse(line));
      },
    });
    ctx = {
      gateway,
      sessions: new SessionCache({ login: (credential, signal) => gateway.login(credential, signal), logger }),
      retryOnRejectedToken: true,
      logger,
    };
  });

  describe("getProjects", () => {
    it("logs in once and reuses the session across calls", async () => {
      gateway.login.mockResolvedValue("T1");
      gateway.listProjects.mockResolvedValue({ projects: [{ uid: "app:1", label: "Cold Chain" }] });

      await getProjects(CREDS, ctx);
      const result = await getProjects(CREDS, ctx);

      expect(result).toEqual({ projects: [{ uid: "app:1", label: "Cold Chain" }] });
      expect(gateway.login).toHaveBeenCalledTimes(1);
      expect(gateway.login).toHaveBeenCalledWith(
        { identity: "ops@example.com", secret: "test-password" },
        expect.any(AbortSignal)
      );
      expect(gateway.listProjects.mock.calls).toEqual([["T1"], ["T1"]]);
    });

    it("fails with ValidationError before any login when the password is blank", async () => {
      await expect(getProjects({ username: "ops@example.com", password: " " }, ctx)).rejects.toThrow(
        new ValidationError("Missing required credential: password")
      );
      expect(gateway.login).not.toHaveBeenCalled();
    });
  });

  describe("rejected session tokens", () => {
    it("logs in again and retries once when the token is refused", async () => {
      gateway.login.mockResolvedValueOnce("T1").mockResolvedValueOnce("T2");
      gateway.listProjects
        .mockRejectedValueOnce(new AuthenticationError("Notehub getProjects failed (401): expired"))
        .mockResolvedValueOnce({ projects: [] });

      const result = await getProjects(CREDS, ctx);

      expect(result).toEqual({ projects: [] });
      expect(gateway.listProjects.mock.calls).toEqual([["T1"], ["T2"]]);
      expect(logs.filter((entry) => entry.event === "session_rejected")).toEqual([
        expect.objectContaining({ level: "warning", tool: "get-projects" }),
      ]);
    });

    it("re-logs in once and sends the note exactly twice when send-note's token is refused", async () => {
      const ack = { projectUid: "app:1", deviceUid: "dev:1", notefileId: "data.qi", sent: true } as const;
      gateway.login.mockResolvedValueOnce("T1").mockResolvedValueOnce("T2");
      gateway.sendNote
        .mockRejectedValueOnce(new AuthenticationError("Notehub handleNoteAdd failed (401): expired"))
        .mockResolvedValueOnce(ack);

      const result = await sendNote({ ...CREDS, projectUid: "app:1", deviceUid: "dev:1", body: { led: "on" } }, ctx);

      expect(result).toEqual(ack);
      expect(gateway.login).toHaveBeenCalledTimes(2);
      expect(gateway.sendNote.mock.calls.map(([token]) => token)).toEqual(["T1", "T2"]);
    });

    it("gives up after the retried call is refused too", async () => {
      gateway.login.mockResolvedValueOnce("T1").mockResolvedValueOnce("T2");
      gateway.listProjects.mockRejectedValue(new AuthenticationError("forbidden"));

      await expect(getProjects(CREDS, ctx)).rejects.toThrow("forbidden");
      expect(gateway.login).toHaveBeenCalledTimes(2);
      expect(gateway.listProjects).toHaveBeenCalledTimes(2);
    });

    it("does not retry when retries are disabled", async () => {
      gateway.login.mockResolvedValue("T1");
      gateway.listProjects.mockRejectedValue(new AuthenticationError("forbidden"));

      await expect(getProjects(CREDS, { ...ctx, retryOnRejectedToken: false })).rejects.toThrow(AuthenticationError);
      expect(gateway.login).toHaveBeenCalledTimes(1);
      expect(gateway.listProjects).toHaveBeenCalledTimes(1);
    });

    it("does not retry transient failures", async () => {
      gateway.login.mockResolvedValue("T1");
      gateway.listProjects.mockRejectedValue(new TransientError("Could not reach Notehub: fetch failed"));

      await expect(getProjects(CREDS, ctx)).rejects.toThrow(TransientError);
      expect(gateway.login).toHaveBeenCalledTimes(1);
      expect(gateway.listProjects).toHaveBeenCalledTimes(1);
    });
  });

  describe("getProjectDevices", () => {
    it("passes the filters through without the credentials", async () => {
      gateway.login.mockResolvedValue("T1");
      gateway.listDevices.mockResolvedValue({ devices: [] });

      await getProjectDevices({ ...CREDS, projectUid: "app:1", tag: ["field"], pageSize: 25 }, ctx);

      expect(gateway.listDevices).toHaveBeenCalledWith("T1", "app:1", { tag: ["field"], pageSize: 25 });
    });

    it("requires a project UID", async () => {
      await expect(getProjectDevices({ ...CREDS, projectUid: "" }, ctx)).rejects.toThrow(
        new ValidationError("Missing required parameter: projectUid")
      );
      expect(gateway.login).not.toHaveBeenCalled();
    });
  });

  describe("getProjectEvents", () => {
    it("passes the filters through without the credentials", async () => {
      gateway.login.mockResolvedValue("T1");
      gateway.listEvents.mockResolvedValue({ events: [] });

      await getProjectEvents({ ...CREDS, projectUid: "app:1", deviceUid: ["dev:1"], files: "_health.qo" }, ctx);

      expect(gateway.listEvents).toHaveBeenCalledWith("T1", "app:1", { deviceUid: ["dev:1"], files: "_health.qo" });
    });
  });

  describe("sendNote", () => {
    it("sends an empty JSON body when neither body nor payload is given", async () => {
      gateway.login.mockResolvedValue("T1");
      gateway.sendNote.mockResolvedValue({ projectUid: "app:1", deviceUid: "dev:1", notefileId: "data.qi", sent: true });

      await sendNote({ ...CREDS, projectUid: "app:1", deviceUid: "dev:1" }, ctx);

      expect(gateway.sendNote).toHaveBeenCalledWith("T1", "app:1", "dev:1", {
        notefileId: undefined,
        body: {},
        payload: undefined,
      });
    });

    it("sends only the payload when no body is given", async () => {
      gateway.login.mockResolvedValue("T1");
      gateway.sendNote.mockResolvedValue({ projectUid: "app:1", deviceUid: "dev:1", notefileId: "bin.qi", sent: true });

      await sendNote({ ...CREDS, projectUid: "app:1", deviceUid: "dev:1", notefileId: "bin.qi", payload: "AAE=" }, ctx);

      expect(gateway.sendNote).toHaveBeenCalledWith("T1", "app:1", "dev:1", {
        notefileId: "bin.qi",
        body: undefined,
        payload: "AAE=",
      });
    });

    it("names every missing target", async () => {
      await expect(sendNote({ ...CREDS, projectUid: " ", deviceUid: "" }, ctx)).rejects.toThrow(
        "Missing required parameter: projectUid, deviceUid"
      );
    });
  });
});

describe("requireFields", () => {
  it("accepts non-blank values", () => {
    expect(() => requireFields({ projectUid: "app:1" })).not.toThrow();
  });

  it("treats undefined as missing", () => {
    expect(() => requireFields({ deviceUid: undefined })).toThrow("Missing required parameter: deviceUid");
  });
});

describe("summaries", () => {
  it("lists projects with a placeholder label", () => {
    expect(summarizeProjects({ projects: [{ uid: "app:1", label: "Cold Chain" }, { uid: "app:2" }] })).toBe(
      "Found 2 project(s):\n- Cold Chain (app:1)\n- (unnamed) (app:2)"
    );
  });

  it("says when no projects are visible", () => {
    expect(summarizeProjects({ projects: [] })).toBe("No Notehub projects are visible to this account.");
  });

  it("lists devices and notes another page", () => {
    const text = summarizeDevices("app:1", {
      devices: [
        { uid: "dev:1", serial_number: "pump-7", last_activity: "2026-01-02T03:04:05Z" },
        { uid: "dev:2", last_activity: null },
      ],
      has_more: true,
    });
    expect(text).toBe(
      'Found 2 device(s) in project app:1:\n- dev:1 "pump-7", last seen 2026-01-02T03:04:05Z\n- dev:2\n' +
        "More devices are available on the next page."
    );
  });

  it("says when no devices matched", () => {
    expect(summarizeDevices("app:1", { devices: [] })).toBe("No devices matched in project app:1.");
  });

  it("counts events per notefile", () => {
    const text = summarizeEvents("app:1", {
      events: [{ file: "_health.qo" }, { file: "data.qo" }, { file: "data.qo" }, {}],
    });
    expect(text).toBe("Found 4 event(s) in project app:1 (_health.qo: 1, data.qo: 2, (unknown): 1).");
  });

  it("says when no events matched and more pages exist", () => {
    expect(summarizeEvents("app:1", { events: [], has_more: true })).toBe(
      "No events matched in project app:1. More events are available on the next page."
    );
  });

  it("confirms a queued note", () => {
    expect(summarizeNote({ projectUid: "app:1", deviceUid: "dev:1", notefileId: "data.qi", sent: true })).toBe(
      "Note added to data.qi on device dev:1 in project app:1."
    );
  });
});
