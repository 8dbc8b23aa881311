import { Command, Option } from "clipanion";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { formatConfigError, loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { redactConfig, renderSampleConfig } from "../../config/sample.js";
import { parseConfig } from "../../config/schema.js";
import { errorCode } from "../../utils/errors.js";

export class ConfigGenerateCommand extends Command {
  static override paths = [["config", "generate"]];

  static override usage = Command.Usage({
    description: "Write a sample configuration file",
    examples: [
      ["Write versebot.config.json", "versebot config generate"],
      ["Write to a specific file", "versebot config generate ./bot.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const target = resolve(this.configFile ?? getConfigPath());
    if (existsSync(target)) {
      this.context.stdout.write(`Config file already exists: ${target} (not overwritten)\n`);
      return 1;
    }
    writeFileSync(target, renderSampleConfig(), { flag: "wx" });
    this.context.stdout.write(
      `Wrote sample config to ${target}\n` +
        "Edit matrix.rooms, then run `versebot auth login` and `versebot bot run`.\n",
    );
    return 0;
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "versebot config validate"],
      ["Validate specific file", "versebot config validate ./bot.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<number> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        return 1;
      }
      throw err;
    }

    try {
      const raw: unknown = JSON.parse(substituteEnv(content));
      parseConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      return 0;
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${formatConfigError(err)}\n`);
      return 1;
    }
  }
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (secrets redacted)",
    examples: [["Show config", "versebot config show"]],
  });

  configFile = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    try {
      const config = loadConfig(this.configFile);
      this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
      return 0;
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${formatConfigError(err)}\n`);
      return 1;
    }
  }
}
