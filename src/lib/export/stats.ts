/**
 * Counters of one export run.
 */
export class ExportStats {
  pagesExported = 0;
  pagesFailed = 0;
  filesCreated = 0;
  foldersCreated = 0;
  readonly errors: [pageId: string, message: string][] = [];

  addError(pageId: string, message: string): void {
    this.errors.push([pageId, message]);
    this.pagesFailed++;
  }

  toString(): string {
    return `ExportStats(exported=${this.pagesExported}, failed=${this.pagesFailed}, files=${this.filesCreated}, folders=${this.foldersCreated})`;
  }
}
