import { createCommandFlags } from "$config/loader";
import { Exporter, planTree } from "$export/exporter";
import { BaseCommand } from "$lib/commands/base-command";
import { log } from "$lib/log";
import { ExportReport } from "$lib/report/report";

const MAX_LISTED_ERRORS = 10;

export default class Export extends BaseCommand<"export"> {
  static override description = "Export a Notion workspace, or one page and its subpages, as a tree of Markdown files.";
  static override examples = [
    "<%= config.bin %> <%= command.id %> --path ./notes",
    "<%= config.bin %> <%= command.id %> --page-id 0123456789abcdef0123456789abcdef --include-databases",
    "<%= config.bin %> <%= command.id %> --dry-run"
  ];
  static override flags = createCommandFlags("export");

  protected readonly commandName = "export";

  public async run(): Promise<void> {
    const { flags } = await this.parse(Export);
    const context = await this.context(flags);
    const command = context.command;

    if (command["dry-run"]) {
      log.info("DRY RUN MODE - no files will be created");
    }
    log.info(command["page-id"] ? `exporting page ${command["page-id"]}` : "exporting all accessible pages", {
      output: command.path
    });

    const forest = await context.hierarchy().build(command["page-id"]);
    if (forest.length === 0) {
      log.warning("no pages found: share pages with the integration or check --page-id");
    }

    const exporter = new Exporter(context.source, {
      output: command.path,
      includeDatabases: command["include-databases"],
      namingStrategy: command["naming-strategy"],
      frontmatter: command.frontmatter,
      maxRows: command["max-rows"],
      dryRun: command["dry-run"]
    });
    const { stats, features, plan, titles } = await exporter.export(forest);

    if (command["dry-run"]) {
      this.log(planTree(plan));
      log.info(`would export ${stats.pagesExported} pages`, {
        files: stats.filesCreated,
        folders: stats.foldersCreated
      });
      return;
    }

    this.log(
      [
        "",
        "Export Complete!",
        `Pages exported:    ${stats.pagesExported}`,
        `Pages failed:      ${stats.pagesFailed}`,
        `Files created:     ${stats.filesCreated}`,
        `Folders created:   ${stats.foldersCreated}`,
        ""
      ].join("\n")
    );

    if (command.verbose && stats.errors.length > 0) {
      log.warning("errors encountered:");
      for (const [pageId, message] of stats.errors.slice(0, MAX_LISTED_ERRORS)) {
        log.warning(`  - page ${pageId}: ${message}`);
      }
      if (stats.errors.length > MAX_LISTED_ERRORS) {
        log.warning(`  ... and ${stats.errors.length - MAX_LISTED_ERRORS} more`);
      }
    }

    if (command.report) {
      const file = await new ExportReport(features.records, titles).save(command.path);
      log.success(`export report saved to ${file}`);
    }

    log.success(`files saved to ${command.path}`);
  }
}
