import { vol } from "memfs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { MissingCredentialsError } from "../utils/errors";
import { defaultCredentialProvider, defaultSecretsPath, requireCredentials } from "./index";

vi.mock("node:fs/promises", () => ({ default: vol.promises }));
vi.mock("../utils/logger");

describe("credentials", () => {
  beforeEach(() => {
    vol.reset();
  });

  it("should keep logins next to the cache, one file per host", () => {
    expect(defaultSecretsPath("/cache", "sftp.example.test")).toBe("/cache/sftp.example.test.login");
  });

  it("should read the default secrets file", async () => {
    vol.fromJSON({ "/cache/sftp.example.test.login": "alice\ntest-secret\n" });
    const provider = defaultCredentialProvider("/cache/sftp.example.test.login");

    expect(await provider.getCredentials("sftp.example.test", { reenter: false })).toEqual({
      user: "alice",
      password: "test-secret",
    });
  });

  describe("requireCredentials", () => {
    it("should return present values", () => {
      expect(requireCredentials("Example API", "apiKey", "test-secret")).toBe("test-secret");
    });

    it.each([undefined, null, ""])("should reject %j", (value) => {
      expect(() => requireCredentials("Example API", "apiKey", value)).toThrow(MissingCredentialsError);
    });

    it("should name the settings key and the secrets file", () => {
      expect(() => requireCredentials("Example API", "apiKey", undefined, "/cache/api.login")).toThrow(
        "No credentials available for Example API. Provide them with the `apiKey` option or in the secrets file `/cache/api.login` (first line user, second line password).",
      );
    });
  });
});
