import { RichText, Span } from "./types";

export namespace richText {
  const display = (span: Span): string => {
    switch (span.kind) {
      case "text":
        return span.text;
      case "mention":
        return span.mention === "user" ? `@${span.text}` : span.text;
      case "equation":
        return `$${span.expression}$`;
    }
  };

  /**
   * Render one span. Markup nests code, bold, italic, strikethrough, then the link outermost.
   */
  export const span = (s: Span): string => {
    let text = display(s);

    if (s.style.code) text = `\`${text}\``;
    if (s.style.bold) text = `**${text}**`;
    if (s.style.italic) text = `*${text}*`;
    if (s.style.strikethrough) text = `~~${text}~~`;

    const target = s.href || (s.kind === "text" ? s.link : null);
    if (target) {
      text = `[${text}](${target})`;
    }

    return text;
  };

  /**
   * Render a span sequence as Markdown. Spans are adjacent: nothing is inserted between them.
   */
  export const render = (spans: RichText | undefined): string => {
    if (!spans || spans.length === 0) {
      return "";
    }
    return spans.map(span).join("");
  };

  /**
   * Concatenated text of the spans, without any markup.
   */
  export const plain = (spans: RichText | undefined): string => (spans ?? []).map((s) => s.plain).join("");
}
