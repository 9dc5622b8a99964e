import { createInterface } from "node:readline/promises";
import type {
  CredentialProvider,
  CredentialRequest,
  CredentialStore,
  Credentials,
  FailureDecision,
} from "./types";

const YES = new Set(["", "y", "yes"]);

export interface ConsoleCredentialProviderOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Offered as a place to remember the details */
  store?: CredentialStore;
  /** Printed before the first prompt */
  banner?: (resource: string) => string;
}

/**
 * Prompts on the terminal for login details and for what to do after a
 * failed transfer.
 */
export class ConsoleCredentialProvider implements CredentialProvider {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(private readonly options: ConsoleCredentialProviderOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  private async ask<T>(fn: (question: (query: string) => Promise<string>) => Promise<T>): Promise<T> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      return await fn((query) => rl.question(query));
    } finally {
      rl.close();
    }
  }

  async getCredentials(resource: string, _request: CredentialRequest): Promise<Credentials | undefined> {
    const banner = this.options.banner?.(resource) ?? `Please enter your login details for ${resource}`;
    const credentials = await this.ask(async (question) => {
      this.output.write(`${banner}\n`);
      for (;;) {
        const user = (await question("\tUsername: ")).trim();
        const password = await question("\tPassword (leave empty if no password needed): ");
        const correct = await question(
          `Are these details correct? User: \`${user}\`, password: \`${password}\` [Y/n] `,
        );
        if (YES.has(correct.trim().toLowerCase())) {
          return { user, password };
        }
      }
    });

    const { store } = this.options;
    if (store) {
      const save = await this.ask((question) =>
        question(
          `Save your login details unencrypted to ${store.filePath}, so you don't need to enter them next time? [Y/n] `,
        ),
      );
      if (YES.has(save.trim().toLowerCase())) {
        await store.save(credentials);
      }
    }
    return credentials;
  }

  async onFailure(resource: string, error: Error): Promise<FailureDecision> {
    const answer = await this.ask((question) =>
      question(
        `Failed to download from ${resource}: ${error.message}\nTry again (1) || Enter new login details (2) || Cancel (3) ? `,
      ),
    );
    if (answer.includes("1")) return "retry";
    if (answer.includes("2")) return "reenter";
    return "cancel";
  }
}
