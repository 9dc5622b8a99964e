import type {
  CredentialProvider,
  CredentialRequest,
  Credentials,
  FailureDecision,
} from "./types";

/**
 * Asks each provider in turn; the first one that has credentials wins.
 * Failure decisions come from the first provider that implements them.
 */
export class ChainCredentialProvider implements CredentialProvider {
  constructor(private readonly providers: CredentialProvider[]) {}

  async getCredentials(resource: string, request: CredentialRequest): Promise<Credentials | undefined> {
    for (const provider of this.providers) {
      const credentials = await provider.getCredentials(resource, request);
      if (credentials) {
        return credentials;
      }
    }
    return undefined;
  }

  async onFailure(resource: string, error: Error): Promise<FailureDecision> {
    for (const provider of this.providers) {
      if (provider.onFailure) {
        return provider.onFailure(resource, error);
      }
    }
    return "cancel";
  }
}
