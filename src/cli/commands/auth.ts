import { Command } from "clipanion";
import { CredentialStore } from "../../auth/credential-store.js";
import { interactiveLogin, logout } from "../../auth/login.js";
import { createLogger } from "../../logging/logger.js";
import { errorMessage } from "../../utils/errors.js";

export class AuthLoginCommand extends Command {
  static override paths = [["auth", "login"]];

  static override usage = Command.Usage({
    description: "Log in to a Matrix account and save the session",
    examples: [["Log in interactively", "versebot auth login"]],
  });

  async execute(): Promise<number> {
    const logger = createLogger({ level: "warn" });
    try {
      await interactiveLogin(new CredentialStore(logger), logger);
      return 0;
    } catch (err) {
      this.context.stderr.write(`Login failed: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}

export class AuthLogoutCommand extends Command {
  static override paths = [["auth", "logout"]];

  static override usage = Command.Usage({
    description: "Revoke the saved session and delete local credentials and keys",
    examples: [["Log out", "versebot auth logout"]],
  });

  async execute(): Promise<number> {
    const logger = createLogger({ level: "warn" });
    const store = new CredentialStore(logger);
    const hadCredential = await logout(store, logger);
    this.context.stdout.write(
      hadCredential ? "Logged out and removed local credentials.\n" : "Not logged in; local state cleared.\n",
    );
    return 0;
  }
}

export class AuthStatusCommand extends Command {
  static override paths = [["auth", "status"]];

  static override usage = Command.Usage({
    description: "Show whether a saved session exists",
    examples: [["Show login status", "versebot auth status"]],
  });

  async execute(): Promise<number> {
    const store = new CredentialStore(createLogger({ level: "error" }));
    const credential = await store.load();

    if (!credential) {
      this.context.stdout.write(`Not logged in (looked for ${store.filePath}).\n`);
      if (process.env["MATRIX_ACCESS_TOKEN"]) {
        this.context.stdout.write("MATRIX_ACCESS_TOKEN is set and will be used by `versebot bot run`.\n");
      }
      return 1;
    }

    this.context.stdout.write(
      `Logged in as ${credential.userId}\n` +
        `  Homeserver: ${credential.homeserver}\n` +
        `  Device:     ${credential.deviceId ?? "(none)"}\n`,
    );
    return 0;
  }
}
