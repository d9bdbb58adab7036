import { readFile } from 'fs/promises';
import type { TimezoneOption } from '@dosebell/shared';
import { z } from 'zod';
import { isValidTimeZone } from '../utils/timezone.js';
import { parseWithSchema } from '../utils/validation.js';

const catalogSchema = z
  .array(
    z.object({
      label: z.string().trim().min(1),
      timezone: z.string().refine(isValidTimeZone, { message: 'Unknown IANA timezone' })
    })
  )
  .min(1);

/** The fixed set of zones a user can pick from, in display order. */
export class TimezoneCatalog {
  private readonly entries: TimezoneOption[];

  constructor(entries: TimezoneOption[]) {
    this.entries = parseWithSchema(entries, catalogSchema);
  }

  options(): TimezoneOption[] {
    return [...this.entries];
  }

  /** Matches a button label or an IANA id, ignoring case and surrounding space. */
  match(input: string): TimezoneOption | null {
    const needle = input.trim().toLowerCase();
    if (!needle) {
      return null;
    }
    return (
      this.entries.find(
        (entry) => entry.label.toLowerCase() === needle || entry.timezone.toLowerCase() === needle
      ) ?? null
    );
  }

  labelFor(timezone: string): string {
    return this.entries.find((entry) => entry.timezone === timezone)?.label ?? timezone;
  }
}

export async function loadTimezoneCatalog(path: string): Promise<TimezoneCatalog> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return new TimezoneCatalog(parseWithSchema(raw, catalogSchema));
}
