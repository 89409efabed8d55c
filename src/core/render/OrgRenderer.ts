import type { TextConverterPort } from '../../ports/TextConverterPort.js';
import type { Entry } from '../journal/schema.js';
import type { TimeTree } from '../timeTree/TimeTree.js';
import { entryBody, entryProperties, entryTitle, firstPhotoLink } from '../journal/entry.js';
import { monthName, weekdayName } from '../timeTree/calendar.js';
import { InvariantViolationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export const EMPTY_TITLE = 'Empty';

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface OrgRendererOptions {
  headingShift?: number;
  imagesDir?: string;
}

export class OrgRenderer {
  private readonly logger = createLogger({ service: 'OrgRenderer' });

  constructor(
    private readonly converter: TextConverterPort,
    private readonly options: OrgRendererOptions = {}
  ) {}

  async render(tree: TimeTree, sink: OutputSink): Promise<void> {
    const logger = this.logger.child({ entries: tree.size });
    logger.info('Rendering outline');

    let rendered = 0;
    for (const year of tree.yearKeys()) {
      sink.write(`* ${year}\n`);

      for (const month of tree.monthKeys(year)) {
        sink.write(`** ${year}-${month} ${monthName(month)}\n`);

        for (const day of tree.dayKeys(year, month)) {
          if (!Number.isInteger(day) || day < 1 || day > 31) {
            throw new InvariantViolationError(`Day ${day} is outside 1-31`);
          }
          sink.write(`*** ${year}-${month}-${day} ${weekdayName(year, month, day)}\n`);

          for (const entry of tree.entries(year, month, day)) {
            sink.write(await this.renderEntry(entry));
            rendered += 1;
          }
        }
      }
    }

    logger.info({ rendered }, 'Outline rendered');
  }

  async renderToString(tree: TimeTree): Promise<string> {
    const chunks: string[] = [];
    await this.render(tree, { write: (chunk: string) => chunks.push(chunk) });
    return chunks.join('');
  }

  private async renderEntry(entry: Entry): Promise<string> {
    this.logger.debug({ creationDate: entry.creationDate.toISOString() }, 'Rendering entry');

    const title = entryTitle(entry, firstPhotoLink(entry, this.options.imagesDir)) ?? EMPTY_TITLE;
    const properties = entryProperties(entry);
    const body = await entryBody(entry, this.converter, {
      photos: entry.photos,
      headingShift: this.options.headingShift,
      imagesDir: this.options.imagesDir,
    });

    const lines: string[] = [];
    lines.push(`**** ${title}`);
    lines.push(':PROPERTIES:');
    for (const [name, value] of properties) {
      lines.push(`:${name}: ${value}`);
    }
    lines.push(':END:');
    lines.push(body ?? '');

    return `${lines.join('\n')}\n`;
  }
}
