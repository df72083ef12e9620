import { describe, it, expect } from "vitest";
import { assertCredential, credentialKey, keyFingerprint } from "../../src/auth/credentials.js";
import { ValidationError } from "../../src/shared/errors.js";

describe("credentialKey", () => {
  it("is stable for the same credential", () => {
    const credential = { identity: "ops@example.com", secret: "test-password" };
    expect(credentialKey(credential)).toBe(credentialKey({ ...credential }));
  });

  it("differs when only the secret differs", () => {
    expect(credentialKey({ identity: "ops@example.com", secret: "secret-a" })).not.toBe(
      credentialKey({ identity: "ops@example.com", secret: "secret-b" })
    );
  });

  it("keeps the identity/secret boundary", () => {
    expect(credentialKey({ identity: "ab", secret: "c" })).not.toBe(credentialKey({ identity: "a", secret: "bc" }));
  });

  it("distinguishes credentials that differ only in where a NUL falls", () => {
    expect(credentialKey({ identity: "a\0", secret: "b" })).not.toBe(credentialKey({ identity: "a", secret: "\0b" }));
  });

  it("does not contain the secret", () => {
    const key = credentialKey({ identity: "ops@example.com", secret: "test-password" });
    expect(key).toMatch(/^[0-9a-f]{64}$/);
    expect(key).not.toContain("test-password");
  });
});

describe("keyFingerprint", () => {
  it("keeps the first 12 characters", () => {
    expect(keyFingerprint("0123456789abcdef")).toBe("0123456789ab");
  });
});

describe("assertCredential", () => {
  it("accepts a complete credential", () => {
    expect(() => assertCredential({ identity: "ops@example.com", secret: "test-password" })).not.toThrow();
  });

  it("names the missing fields", () => {
    expect(() => assertCredential({ identity: " ", secret: "" })).toThrow(
      new ValidationError("Missing required credential: username, password")
    );
  });
});
