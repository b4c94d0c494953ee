import { log } from "$lib/log";

/**
 * One place where source content could not be represented exactly in Markdown.
 */
export interface UnsupportedFeature {
  blockType: string;
  feature: string;
  blockId: string;
  /**
   * Page being converted when the record was made.
   */
  pageId?: string;
}

export const describeFeature = (f: UnsupportedFeature) => `Unsupported: ${f.blockType}.${f.feature} (block: ${f.blockId})`;

/**
 * Append-only log of fidelity-loss events, in the order they were found.
 */
export class FeatureLog {
  private readonly entries: UnsupportedFeature[] = [];

  record(feature: UnsupportedFeature): void {
    log.debug(describeFeature(feature), { pageId: feature.pageId });
    this.entries.push(feature);
  }

  get records(): readonly UnsupportedFeature[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}
