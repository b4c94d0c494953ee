import yaml from "yaml";

export class Config<T> {
  private readonly config: T;

  constructor(config: T) {
    this.config = config;
  }

  get rendered(): T {
    return this.config;
  }

  /**
   * The configuration as YAML, with the token masked.
   */
  toYaml(): string {
    return yaml.stringify(this.config, (key, value) =>
      key === "token" && typeof value === "string" ? `${value.slice(0, 7)}…` : value
    );
  }
}
