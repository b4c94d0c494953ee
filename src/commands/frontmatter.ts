import { Args } from "@oclif/core";
import { createCommandFlags } from "$config/loader";
import { applyFrontmatter } from "$export/frontmatter";
import { BaseCommand } from "$lib/commands/base-command";
import { log } from "$lib/log";

export default class Frontmatter extends BaseCommand<"frontmatter"> {
  static override description = "Add YAML front matter to the Markdown files of an earlier export.";
  static override examples = ["<%= config.bin %> <%= command.id %> ./notion", "<%= config.bin %> <%= command.id %> ./notion --dry-run"];
  static override args = {
    directory: Args.directory({ description: "Directory of an earlier export.", required: true, exists: true })
  };
  static override flags = createCommandFlags("frontmatter");

  protected readonly commandName = "frontmatter";

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Frontmatter);
    const context = await this.context(flags);
    const command = context.command;

    const forest = await context.hierarchy().build(command["page-id"]);
    const result = await applyFrontmatter(forest, args.directory, {
      dryRun: command["dry-run"],
      namingStrategy: command["naming-strategy"]
    });

    this.log(
      [
        `Files found:       ${result.found}`,
        `${command["dry-run"] ? "Would update:      " : "Files updated:     "}${result.updated}`,
        `Already had it:    ${result.skipped}`,
        `No matching page:  ${result.unmatched.length}`
      ].join("\n")
    );

    for (const file of result.unmatched) {
      log.debug(`no page for ${file}`);
    }
    for (const [file, message] of result.failed) {
      log.error(`${file}: ${message}`);
    }
  }
}
