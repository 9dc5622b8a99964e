import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../utils/logger";
import type { CredentialProvider, CredentialRequest, CredentialStore, Credentials } from "./types";

/**
 * Reads login details from a plain text file: user name on the first line,
 * password on the second. The file is stored unencrypted.
 */
export class SecretsFileCredentialProvider implements CredentialProvider, CredentialStore {
  constructor(readonly filePath: string) {}

  async getCredentials(_resource: string, request: CredentialRequest): Promise<Credentials | undefined> {
    if (request.reenter) {
      return undefined;
    }
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      logger.debug(
        `No secrets file at ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return undefined;
    }
    const [user = "", password = ""] = raw.split(/\r?\n/).map((line) => line.trim());
    return user ? { user, password } : undefined;
  }

  async save(credentials: Credentials): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${credentials.user}\n${credentials.password}`, { mode: 0o600 });
    logger.info(`💾 Saved login details to ${this.filePath}`);
  }
}
