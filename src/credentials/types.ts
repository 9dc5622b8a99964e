export interface Credentials {
  user: string;
  /** Empty when the account needs no password */
  password: string;
}

/**
 * What to do after a transfer failed with the current credentials.
 */
export type FailureDecision = "retry" | "reenter" | "cancel";

export interface CredentialRequest {
  /** Ask for new details instead of returning stored ones */
  reenter: boolean;
}

/**
 * Supplies login details for gated resources. Batch jobs plug in a
 * non-interactive provider; terminals can use the console prompt.
 */
export interface CredentialProvider {
  /**
   * Credentials for `resource` (usually a host name), or `undefined` if this
   * provider has none.
   */
  getCredentials(resource: string, request: CredentialRequest): Promise<Credentials | undefined>;

  /**
   * Decides how to continue after a failed transfer. Providers without an
   * opinion leave it out, which cancels.
   */
  onFailure?(resource: string, error: Error): Promise<FailureDecision>;
}

/**
 * Somewhere entered login details can be remembered.
 */
export interface CredentialStore {
  readonly filePath: string;
  save(credentials: Credentials): Promise<void>;
}
