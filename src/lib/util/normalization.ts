export namespace normalization {
  export enum strategy {
    TITLE = "title",
    SLUG = "slug"
  }

  export const FALLBACK = "Untitled";
  export const MAX_LENGTH = 200;

  const trim = (value: string): string => value.replace(/^[.\s]+|[.\s]+$/g, "");

  /**
   * Turn a page title into a single safe path segment of at most
   * `MAX_LENGTH` code points.
   *
   * Applying it to its own output returns the same string.
   */
  export const sanitize = (title: string): string => {
    const cleaned = trim(
      title
        .replace(/[/\\:*?"<>|]/g, "_") // Replace invalid characters
        .replace(/\s+/g, " ")
    );

    return trim([...cleaned].slice(0, MAX_LENGTH).join("")) || FALLBACK;
  };

  /**
   * Create URL-friendly slug from title
   */
  export const slug = (title: string): string => {
    return title
      .toLowerCase()
      .replace(/[^\w\s-]/g, "") // Remove special characters
      .replace(/[\s_]+/g, "-")
      .replace(/-{2,}/g, "-")
      .replace(/^-|-$/g, "");
  };

  /**
   * Path segment for a title under the given naming strategy.
   */
  export const normalize = (title: string, namingStrategy: strategy = strategy.TITLE): string => {
    switch (namingStrategy) {
      case strategy.TITLE:
        return sanitize(title);
      case strategy.SLUG:
        return sanitize(slug(title));
    }
  };
}
