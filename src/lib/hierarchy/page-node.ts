import { NotionObjectMetadata, NotionObjectType } from "$notion/types";

/**
 * One exportable page or database in the discovered tree.
 */
export class PageNode {
  readonly children: PageNode[] = [];

  constructor(
    readonly id: string,
    readonly title: string,
    readonly parentId: string | null = null,
    readonly isDatabase: boolean = false,
    readonly createdTime: string | null = null,
    readonly lastEditedTime: string | null = null
  ) {}

  static from(metadata: NotionObjectMetadata, parentId: string | null): PageNode {
    return new PageNode(
      metadata.id,
      metadata.title || "Untitled",
      parentId,
      metadata.objectType === NotionObjectType.DATABASE,
      metadata.createdTime,
      metadata.lastEditedTime
    );
  }

  get hasChildren(): boolean {
    return this.children.length > 0;
  }

  /**
   * Number of nodes in this subtree, including this one.
   */
  count(): number {
    return this.children.reduce((total, child) => total + child.count(), 1);
  }

  toTreeString(prefix = "", last = true, root = true): string {
    const connector = root ? "" : last ? "└─ " : "├─ ";
    const marker = this.isDatabase ? " [Database]" : "";
    const lines = [`${prefix}${connector}${this.title}${marker}`];
    const childPrefix = root ? "" : prefix + (last ? "   " : "│  ");

    this.children.forEach((child, index) => {
      lines.push(child.toTreeString(childPrefix, index === this.children.length - 1, false));
    });

    return lines.join("\n");
  }
}
