import { PDFParse } from 'pdf-parse';
import { StatementDocument } from '../../../domain/entities/Statement.js';
import { LoggerPort } from '../../../application/ports/LoggerPort.js';
import { TextSourcePort } from '../../../application/ports/TextSourcePort.js';

export class PdfTextSource implements TextSourcePort {
  constructor(private readonly logger: LoggerPort) {}

  async readPages(rawDocument: Buffer): Promise<StatementDocument> {
    const parser = new PDFParse({ data: rawDocument });

    try {
      const result = await parser.getText();
      const pages = result.pages.map((page, index) => ({ pageIndex: index, text: page.text }));

      this.logger.info('📄 PDF text extracted', {
        pages: pages.length,
        characters: pages.reduce((total, page) => total + page.text.length, 0),
      });

      return { pages };
    } catch (error) {
      throw new Error(`Failed to read PDF statement: ${error instanceof Error ? error.message : 'Unknown error'}`, {
        cause: error,
      });
    } finally {
      await parser.destroy();
    }
  }
}
