import { Flags } from "@oclif/core";
import { z } from "zod";
import { normalization } from "$util/normalization";

// @mark Command Configuration Definitions

const TRUTHY = ["1", "true", "yes", "on"];

/**
 * Boolean option that also accepts the strings environment variables carry.
 */
const boolean = (fallback: boolean) =>
  z.preprocess(
    (value) => (typeof value === "string" ? TRUTHY.includes(value.trim().toLowerCase()) : value),
    z.boolean().default(fallback)
  );

/**
 * A configuration option: where it can come from and how it is validated.
 */
export interface ConfigOption {
  /** Environment variables and YAML keys that carry this option. */
  variants: readonly string[];
  /** The oclif flag definition for this configuration option. */
  flag: unknown;
  /** Validation and coercion of the merged value. */
  schema: z.ZodTypeAny;
}

export const definitions = {
  /**
   * Options available to all commands.
   */
  token: {
    variants: ["NOTION_TOKEN", "token"],
    flag: Flags.string({
      description: "Notion API integration token. Falls back to NOTION_TOKEN, then ~/.ssh/secret.env."
    }),
    schema: z.string().optional()
  },
  verbose: {
    variants: ["VERBOSE", "verbose"],
    flag: Flags.boolean({
      char: "v",
      description: "Enable verbose logging."
    }),
    schema: boolean(false)
  },
  retries: {
    variants: ["RETRIES", "retries"],
    flag: Flags.integer({
      description: "Maximum number of retries of a failed API request. [default: 3]"
    }),
    schema: z.coerce.number().int().min(0).default(3)
  },
  timeout: {
    variants: ["TIMEOUT", "timeout"],
    flag: Flags.integer({
      description: "Request timeout in milliseconds. [default: 30000]"
    }),
    schema: z.coerce.number().int().positive().default(30000)
  },
  "page-id": {
    variants: ["NOTION_PAGE_ID", "page-id"],
    flag: Flags.string({
      description: "Start from this page instead of every workspace-level page."
    }),
    schema: z.string().min(1).optional()
  },
  "max-depth": {
    variants: ["MAX_DEPTH", "max-depth"],
    flag: Flags.integer({
      description: "Pages nested this deep below a root are not exported. [default: 10]"
    }),
    schema: z.coerce.number().int().positive().default(10)
  },

  /**
   * Export specific options.
   */
  path: {
    variants: ["OUTPUT", "path", "output"],
    flag: Flags.string({
      char: "p",
      aliases: ["output"],
      description: "Output directory for exported files. [default: notion]"
    }),
    schema: z.string().min(1).default("notion")
  },
  "dry-run": {
    variants: ["DRY_RUN", "dry-run"],
    flag: Flags.boolean({
      description: "Show what would be written without writing anything."
    }),
    schema: boolean(false)
  },
  "include-databases": {
    variants: ["INCLUDE_DATABASES", "include-databases"],
    flag: Flags.boolean({
      description: "Export child databases as Markdown tables."
    }),
    schema: boolean(false)
  },
  "naming-strategy": {
    variants: ["NAMING_STRATEGY", "naming-strategy"],
    flag: Flags.string({
      description: "How file and folder names are derived from page titles. [default: title]",
      options: Object.values(normalization.strategy)
    }),
    schema: z.nativeEnum(normalization.strategy).default(normalization.strategy.TITLE)
  },
  frontmatter: {
    variants: ["FRONTMATTER", "frontmatter"],
    flag: Flags.boolean({
      description: "Prepend YAML front matter to every exported document."
    }),
    schema: boolean(false)
  },
  "max-rows": {
    variants: ["MAX_ROWS", "max-rows"],
    flag: Flags.integer({
      description: "Maximum number of rows of an exported database table."
    }),
    schema: z.coerce.number().int().positive().optional()
  },
  report: {
    variants: ["REPORT", "report"],
    flag: Flags.boolean({
      allowNo: true,
      description: "Write export_report.md listing content that could not be converted. [default: true]"
    }),
    schema: boolean(true)
  }
} satisfies Record<string, ConfigOption>;

export type OptionName = keyof typeof definitions;

export const isOption = (name: string): name is OptionName => Object.prototype.hasOwnProperty.call(definitions, name);

const option = <K extends OptionName>(name: K): (typeof definitions)[K]["schema"] => definitions[name].schema;

const common = {
  token: option("token"),
  verbose: option("verbose"),
  retries: option("retries"),
  timeout: option("timeout"),
  "page-id": option("page-id"),
  "max-depth": option("max-depth")
};

/**
 * The options each command takes.
 */
export const commands = {
  export: z.object({
    ...common,
    path: option("path"),
    "dry-run": option("dry-run"),
    "include-databases": option("include-databases"),
    "naming-strategy": option("naming-strategy"),
    frontmatter: option("frontmatter"),
    "max-rows": option("max-rows"),
    report: option("report")
  }),
  hierarchy: z.object(common),
  frontmatter: z.object({
    ...common,
    "dry-run": option("dry-run"),
    "naming-strategy": option("naming-strategy")
  })
};

export type CommandName = keyof typeof commands;

export type ResolvedCommandConfig<C extends CommandName> = z.infer<(typeof commands)[C]>;
