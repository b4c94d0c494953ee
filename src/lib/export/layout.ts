import path from "path";
import type { PageNode } from "$lib/hierarchy/page-node";
import { normalization } from "$util/normalization";

export const INDEX_FILE = "index.md";

export namespace layout {
  /**
   * Base name shared by a node's folder and its document.
   */
  export const name = (node: PageNode, strategy?: normalization.strategy): string =>
    normalization.normalize(node.title, strategy);

  /**
   * Directory of a node that has children.
   */
  export const folder = (node: PageNode, parent: string, strategy?: normalization.strategy): string =>
    path.join(parent, name(node, strategy));

  /**
   * Document of a node without collision suffix: `index.md` inside its folder
   * when it has children, `<name>.md` beside its siblings otherwise.
   */
  export const document = (node: PageNode, parent: string, strategy?: normalization.strategy): string =>
    node.hasChildren
      ? path.join(folder(node, parent, strategy), INDEX_FILE)
      : path.join(parent, `${name(node, strategy)}.md`);

  /**
   * Every document path of a forest mapped to its node. The first node wins a shared path.
   */
  export const map = (
    forest: readonly PageNode[],
    root: string,
    strategy?: normalization.strategy
  ): Map<string, PageNode> => {
    const paths = new Map<string, PageNode>();

    const visit = (node: PageNode, parent: string) => {
      const file = document(node, parent, strategy);
      if (!paths.has(file)) paths.set(file, node);

      if (node.hasChildren) {
        const dir = folder(node, parent, strategy);
        node.children.forEach((child) => visit(child, dir));
      }
    };

    forest.forEach((node) => visit(node, root));

    return paths;
  };
}
