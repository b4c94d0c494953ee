import { Command } from "@oclif/core";
import { resolveToken } from "$config/credentials";
import type { CommandName, ResolvedCommandConfig } from "$config/definitions";
import { loadCommandConfig } from "$config/loader";
import { DomainError } from "$shared/errors";
import { Context } from "../context";
import { log } from "../log";

export abstract class BaseCommand<C extends CommandName> extends Command {
  /**
   * Which command's options to load.
   */
  protected abstract readonly commandName: C;

  /**
   * Resolve configuration and credentials into the context of this run.
   */
  protected async context(flags: Record<string, unknown>): Promise<Context<ResolvedCommandConfig<C>>> {
    const config = await loadCommandConfig(this.commandName, flags);
    const command = config.rendered;

    if (command.verbose) {
      log.setLevel("debug");
    }
    log.debugging.inspect("configuration", config.toYaml());

    const token = await resolveToken(command.token);

    return new Context({ command, token });
  }

  protected async catch(err: Error & { exitCode?: number }): Promise<unknown> {
    if (err instanceof DomainError) {
      log.error(`${err.name}: ${err.message}`);
      return this.exit(1);
    }
    return super.catch(err);
  }
}
