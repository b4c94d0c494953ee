import { createCommandFlags } from "$config/loader";
import { BaseCommand } from "$lib/commands/base-command";
import { log } from "$lib/log";

export default class Hierarchy extends BaseCommand<"hierarchy"> {
  static override description = "Print the page tree that an export would write.";
  static override examples = ["<%= config.bin %> <%= command.id %>", "<%= config.bin %> <%= command.id %> --max-depth 3"];
  static override flags = createCommandFlags("hierarchy");

  protected readonly commandName = "hierarchy";

  public async run(): Promise<void> {
    const { flags } = await this.parse(Hierarchy);
    const context = await this.context(flags);

    const builder = context.hierarchy();
    const forest = await builder.build(context.command["page-id"]);

    for (const root of forest) {
      this.log(root.toTreeString());
      this.log("");
    }

    const total = forest.reduce((sum, root) => sum + root.count(), 0);
    log.success(`found ${forest.length} root page(s), ${total} page(s) in total`);

    if (builder.issues.length > 0) {
      log.warning(`${builder.issues.length} branch(es) skipped, rerun with --verbose for details`);
    }
  }
}
