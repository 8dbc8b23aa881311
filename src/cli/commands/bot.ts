import { Command, Option } from "clipanion";
import { startBot } from "../../gateway/lifecycle.js";
import { errorMessage } from "../../utils/errors.js";

export class BotRunCommand extends Command {
  static override paths = [["bot", "run"], Command.Default];

  static override usage = Command.Usage({
    description: "Connect to Matrix and answer scripture references",
    examples: [
      ["Start with the default config", "versebot bot run"],
      ["Start with a custom config", "versebot bot run --config ./versebot.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    try {
      const ctx = await startBot({ configPath: this.config });
      await ctx.stopped;
      return 0;
    } catch (err) {
      this.context.stderr.write(`Failed to start versebot: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
