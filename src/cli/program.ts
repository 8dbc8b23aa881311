import { Cli } from "clipanion";
import { readFileSync } from "node:fs";
import { z } from "zod";
import { BotRunCommand } from "./commands/bot.js";
import { AuthLoginCommand, AuthLogoutCommand, AuthStatusCommand } from "./commands/auth.js";
import {
  ConfigGenerateCommand,
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";

function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));
  return z.object({ version: z.string() }).parse(raw).version;
}

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "versebot",
    binaryName: "versebot",
    binaryVersion: packageVersion(),
  });

  cli.register(BotRunCommand);

  // Auth commands
  cli.register(AuthLoginCommand);
  cli.register(AuthLogoutCommand);
  cli.register(AuthStatusCommand);

  // Config commands
  cli.register(ConfigGenerateCommand);
  cli.register(ConfigValidateCommand);
  cli.register(ConfigShowCommand);

  return cli;
}
