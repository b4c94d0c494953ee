import { HierarchyBuilder } from "$lib/hierarchy/builder";
import { NotionClient } from "$notion/client";
import type { WorkspaceSource } from "$notion/types";
import type { ResolvedCommandConfig } from "./config/definitions";

type CommonConfig = ResolvedCommandConfig<"hierarchy">;

export type ContextConfig<C extends CommonConfig> = {
  command: C;
  token: string;
  /**
   * Replaces the API client, for tests.
   */
  source?: WorkspaceSource;
};

/**
 * Everything a command run needs: its resolved options and the workspace it reads.
 */
export class Context<C extends CommonConfig> {
  readonly command: C;
  readonly source: WorkspaceSource;

  constructor(config: ContextConfig<C>) {
    this.command = config.command;
    this.source =
      config.source ??
      new NotionClient({
        apiKey: config.token,
        timeout: config.command.timeout,
        retries: config.command.retries
      });
  }

  hierarchy(): HierarchyBuilder {
    return new HierarchyBuilder(this.source, { maxDepth: this.command["max-depth"] });
  }
}
