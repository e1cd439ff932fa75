import { StatementDocument } from '../../domain/entities/Statement.js';

export interface TextSourcePort {
  readPages(rawDocument: Buffer): Promise<StatementDocument>;
}
