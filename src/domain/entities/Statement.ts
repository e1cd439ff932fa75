export interface StatementPeriod {
  start: string; // ISO date
  end: string; // ISO date
}

export interface StatementMetadata {
  bankName?: string;
  accountMask?: string;
  period?: StatementPeriod;
  openingBalance?: number;
  closingBalance?: number;
}

export interface PageText {
  pageIndex: number;
  text: string;
}

export interface StatementDocument {
  pages: PageText[];
}

export const documentFromText = (text: string): StatementDocument => ({
  pages: [{ pageIndex: 0, text }],
});

export const documentText = (document: StatementDocument): string =>
  document.pages.map((page) => page.text).join('\n');

export const isBlankDocument = (document: StatementDocument): boolean =>
  document.pages.every((page) => page.text.trim() === '');
