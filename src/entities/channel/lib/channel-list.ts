/**
 * Parsing of channel lists from configuration
 */

import type { Channel } from '../types';

/**
 * Parse a comma-separated channel list.
 *
 * Entries are `UC...` IDs or `@handles`, optionally followed by `=Display Name`:
 * `UCabc=Some Channel, @other`
 */
export function parseChannelList(value: string): Channel[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const separator = entry.indexOf('=');
      if (separator === -1) {
        return { id: entry };
      }
      const id = entry.slice(0, separator).trim();
      const name = entry.slice(separator + 1).trim();
      return name ? { id, name } : { id };
    });
}

/**
 * Split one CSV line into fields (double-quoted fields may contain commas and "" escapes)
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (inQuotes) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  fields.push(current);
  return fields;
}

/**
 * Parse a Google Takeout `subscriptions.csv` export
 * (header: `Channel Id,Channel Url,Channel Title`)
 */
export function parseSubscriptionsCsv(content: string): Channel[] {
  const lines = content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);

  if (lines.length === 0) {
    return [];
  }

  const header = splitCsvLine(lines[0]).map((field) => field.trim().toLowerCase());
  const idColumn = header.indexOf('channel id');
  const titleColumn = header.indexOf('channel title');

  if (idColumn === -1) {
    throw new Error('Subscriptions CSV is missing a "Channel Id" column');
  }

  return lines.slice(1).flatMap((line) => {
    const fields = splitCsvLine(line);
    const id = (fields[idColumn] ?? '').trim();
    if (!id) {
      return [];
    }
    const name = titleColumn === -1 ? '' : (fields[titleColumn] ?? '').trim();
    return [name ? { id, name } : { id }];
  });
}

/**
 * Merge channel lists, keeping the first occurrence of each ID
 * (a later entry only fills in a missing name)
 */
export function mergeChannels(...lists: Channel[][]): Channel[] {
  const byId = new Map<string, Channel>();

  for (const channel of lists.flat()) {
    const existing = byId.get(channel.id);
    if (!existing) {
      byId.set(channel.id, { ...channel });
    } else if (!existing.name && channel.name) {
      existing.name = channel.name;
    }
  }

  return [...byId.values()];
}
