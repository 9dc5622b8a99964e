import path from "node:path";
import { MissingCredentialsError } from "../utils/errors";
import { ChainCredentialProvider } from "./ChainCredentialProvider";
import { ConsoleCredentialProvider } from "./ConsoleCredentialProvider";
import { SecretsFileCredentialProvider } from "./SecretsFileCredentialProvider";
import type { CredentialProvider } from "./types";

export { ChainCredentialProvider } from "./ChainCredentialProvider";
export { ConsoleCredentialProvider } from "./ConsoleCredentialProvider";
export type { ConsoleCredentialProviderOptions } from "./ConsoleCredentialProvider";
export { SecretsFileCredentialProvider } from "./SecretsFileCredentialProvider";
export { StaticCredentialProvider } from "./StaticCredentialProvider";
export type {
  CredentialProvider,
  CredentialRequest,
  CredentialStore,
  Credentials,
  FailureDecision,
} from "./types";

/**
 * `<cacheDir>/<host>.login`, where SFTP logins are remembered by default.
 */
export function defaultSecretsPath(cacheDir: string, host: string): string {
  return path.join(cacheDir, `${host}.login`);
}

/**
 * The secrets file first, then a terminal prompt when stdin is interactive.
 */
export function defaultCredentialProvider(secretsPath: string): CredentialProvider {
  const store = new SecretsFileCredentialProvider(secretsPath);
  const providers: CredentialProvider[] = [store];
  if (process.stdin.isTTY) {
    providers.push(new ConsoleCredentialProvider({ store }));
  }
  return new ChainCredentialProvider(providers);
}

/**
 * Returns `value` or fails with a message naming where the login is expected.
 * For resources that silently return nothing without a login.
 *
 * @throws {MissingCredentialsError} If `value` is empty
 */
export function requireCredentials<T>(
  resource: string,
  settingsKey: string,
  value: T | null | undefined,
  secretsPath?: string,
): T {
  if (value === undefined || value === null || value === "") {
    throw new MissingCredentialsError(resource, settingsKey, secretsPath);
  }
  return value;
}
