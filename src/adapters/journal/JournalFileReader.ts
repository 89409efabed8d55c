import { readFile } from 'node:fs/promises';
import { decodeJournal, type Journal } from '../../core/journal/schema.js';
import { createLogger } from '../../utils/logger.js';
import { DecodeError, InputUnavailableError } from '../../utils/errors.js';

export class JournalFileReader {
  private readonly logger = createLogger({ adapter: 'JournalFileReader' });

  async read(path: string): Promise<Journal> {
    const logger = this.logger.child({ method: 'read', path });

    let contents: string;
    try {
      contents = await readFile(path, 'utf8');
    } catch (error) {
      logger.error({ error }, 'Failed to read journal export');
      throw new InputUnavailableError(path, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      throw new DecodeError(`${path} is not valid JSON`, 'DECODE_ERROR', { cause: error });
    }

    const journal = decodeJournal(raw);
    logger.info(
      { version: journal.metadata.version, entries: journal.entries.length },
      'Loaded journal export'
    );
    return journal;
  }
}
