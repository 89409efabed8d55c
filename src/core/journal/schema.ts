import { z } from 'zod';
import { DecodeError } from '../../utils/errors.js';
import { utcDate } from '../timeTree/calendar.js';

const CREATION_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;
export const CREATION_DATE_FORMAT = 'YYYY-MM-DDTHH:MM:SSZ';

/**
 * Parse a `YYYY-MM-DDTHH:MM:SSZ` timestamp as UTC.
 * Anything else (fractional seconds, offsets, out-of-range fields such as Feb 30) is rejected.
 */
export function parseCreationDate(value: string): Date | undefined {
  const match = CREATION_DATE_REGEX.exec(value);
  if (!match) return undefined;

  const [year, month, day, hour, minute, second] = match.slice(1).map((part) => Number(part));
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return undefined;
  }

  const date = utcDate(year, month, day, hour, minute, second);
  // Overflowing fields roll forward; a round trip catches that
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return undefined;
  }
  return date;
}

// The exporting app writes null for some missing values; treat it the same as an absent key
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const creationDateSchema = z.string().transform((value, ctx) => {
  const date = parseCreationDate(value);
  if (!date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected format ${CREATION_DATE_FORMAT}, got "${value}"`,
    });
    return z.NEVER;
  }
  return date;
});

const metadataSchema = z.object({
  version: z.string(),
});

const locationSchema = z.object({
  longitude: z.number(),
  latitude: z.number(),
  placeName: z.string(),
});

const weatherSchema = z.object({
  conditionsDescription: optional(z.string()),
  moonPhaseCode: optional(z.string()),
});

const musicSchema = z.object({
  artist: z.string(),
  track: z.string(),
});

const photoSchema = z.object({
  md5: z.string().min(1),
  type: z.string().min(1),
  orderInEntry: z.number().int().nonnegative(),
});

const entrySchema = z.object({
  creationDate: creationDateSchema,
  text: optional(z.string()),
  location: optional(locationSchema),
  weather: optional(weatherSchema),
  music: optional(musicSchema),
  photos: optional(z.array(photoSchema)),
});

export const journalSchema = z.object({
  metadata: metadataSchema,
  entries: z.array(entrySchema),
});

export type Metadata = z.output<typeof metadataSchema>;
export type Location = z.output<typeof locationSchema>;
export type Weather = z.output<typeof weatherSchema>;
export type Music = z.output<typeof musicSchema>;
export type Photo = z.output<typeof photoSchema>;
export type Entry = z.output<typeof entrySchema>;
export type Journal = z.output<typeof journalSchema>;

export function decodeJournal(raw: unknown): Journal {
  const result = journalSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new DecodeError(`Journal export does not match the expected shape:\n${issues.join('\n')}`);
  }
  return result.data;
}
