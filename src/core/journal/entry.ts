import type { Entry, Photo } from './schema.js';
import type { TextConverterPort } from '../../ports/TextConverterPort.js';
import { moonGlyph } from './moonPhases.js';
import { createLogger } from '../../utils/logger.js';

const MARKDOWN_HEADING_REGEX = /^#+\s/;
// Photo placeholders as they appear in the markdown source and after conversion to Org
const MARKDOWN_PHOTO_REGEX = /!\[\]\(dayone-moment:\/\/[^)]+\)/;
const ORG_PHOTO_REGEX = /\[\[dayone-moment:\/\/[^\]]+\]\]/;
const ORG_PHOTO_REGEX_GLOBAL = new RegExp(ORG_PHOTO_REGEX.source, 'g');

export const DEFAULT_IMAGES_DIR = './images';
export const DEFAULT_HEADING_SHIFT = 4;
// pandoc's Org writer opens with a fixed block before the body proper
export const CONVERTER_PREAMBLE_LINES = 4;

export function entryYear(entry: Entry): number {
  return entry.creationDate.getUTCFullYear();
}

export function entryMonth(entry: Entry): number {
  return entry.creationDate.getUTCMonth() + 1;
}

export function entryDay(entry: Entry): number {
  return entry.creationDate.getUTCDate();
}

/**
 * Org properties for an entry, keyed by property name.
 * Only sub-records present on the entry contribute keys.
 */
export function entryProperties(entry: Entry): Map<string, string> {
  const props = new Map<string, string>();

  if (entry.weather) {
    if (entry.weather.moonPhaseCode !== undefined) {
      props.set('Moon', moonGlyph(entry.weather.moonPhaseCode));
    }
    if (entry.weather.conditionsDescription !== undefined) {
      props.set('Weather', entry.weather.conditionsDescription);
    }
  }

  if (entry.music) {
    props.set('Music', `${entry.music.artist} — ${entry.music.track}`);
  }

  if (entry.location) {
    props.set('Latitude', String(entry.location.latitude));
    props.set('Longitude', String(entry.location.longitude));
    props.set('Location', entry.location.placeName);
  }

  return props;
}

export function photoLink(photo: Photo, imagesDir: string = DEFAULT_IMAGES_DIR): string {
  const dir = imagesDir.replace(/\/+$/, '');
  return `[[${dir}/${photo.md5}.${photo.type}]]`;
}

export function sortPhotos(photos: readonly Photo[]): Photo[] {
  return [...photos].sort((a, b) => a.orderInEntry - b.orderInEntry);
}

export function firstPhotoLink(entry: Entry, imagesDir?: string): string | undefined {
  const [first] = sortPhotos(entry.photos ?? []);
  return first ? photoLink(first, imagesDir) : undefined;
}

/** Split like a line iterator: no trailing empty line, CRLF tolerated. */
export function splitLines(text: string): string[] {
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function entryTitle(entry: Entry, firstPhoto?: string): string | undefined {
  if (entry.text === undefined) return undefined;

  const [firstLine] = splitLines(entry.text);
  if (firstLine === undefined) return undefined;

  const title = firstLine.replace(MARKDOWN_HEADING_REGEX, '');
  if (firstPhoto === undefined) return title;
  return title.replace(MARKDOWN_PHOTO_REGEX, () => firstPhoto);
}

export interface BodyOptions {
  photos?: readonly Photo[];
  headingShift?: number;
  imagesDir?: string;
}

/**
 * Convert the entry's markdown to Org and swap photo placeholders for image links.
 *
 * Photos are taken in `orderInEntry` order and each one fills the leftmost placeholder
 * still in the body. Extra placeholders are left in place; extra photos are not linked.
 */
export async function entryBody(
  entry: Entry,
  converter: TextConverterPort,
  options: BodyOptions = {}
): Promise<string | undefined> {
  if (entry.text === undefined) return undefined;
  if (entry.text === '') return '';

  const converted = await converter.convert(entry.text, {
    from: 'markdown',
    to: 'org',
    shiftHeadingLevelBy: options.headingShift ?? DEFAULT_HEADING_SHIFT,
  });

  let body = splitLines(converted).slice(CONVERTER_PREAMBLE_LINES).join('\n');

  if (options.photos && options.photos.length > 0) {
    const placeholderCount = body.match(ORG_PHOTO_REGEX_GLOBAL)?.length ?? 0;
    if (placeholderCount !== options.photos.length) {
      createLogger({ component: 'entry' }).warn(
        {
          creationDate: entry.creationDate.toISOString(),
          placeholders: placeholderCount,
          photos: options.photos.length,
        },
        'Photo count does not match placeholder count'
      );
    }

    for (const photo of sortPhotos(options.photos)) {
      const link = photoLink(photo, options.imagesDir);
      body = body.replace(ORG_PHOTO_REGEX, () => link);
    }
  }

  return body;
}
