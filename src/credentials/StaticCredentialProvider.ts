import type { CredentialProvider, Credentials } from "./types";

/**
 * Fixed credentials per resource, e.g. from a settings file or environment.
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly entries: Map<string, Credentials>;

  constructor(entries: Record<string, Credentials> = {}) {
    this.entries = new Map(Object.entries(entries));
  }

  async getCredentials(resource: string): Promise<Credentials | undefined> {
    return this.entries.get(resource);
  }
}
