import type { StoredTranscriptEntry, Turn } from '../../models/types';
import type { TranscriptStore } from '../../repositories/transcriptRepository';

export interface HistoryEntry {
  id: string;
  participant: string;
  jobTitle: string;
  model: string;
  timestamp: string;
  displayTime: string;
  evaluation: string;
  turns: Turn[];
}

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const ISO_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

/** Milliseconds since epoch, or null when the value is not an ISO-8601 timestamp. */
export function parseTimestamp(timestamp: string): number | null {
  const prefix = ISO_PREFIX.exec(timestamp);
  if (!prefix) return null;
  // Records written without a zone designator are UTC.
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/.test(timestamp);
  const millis = Date.parse(hasZone || timestamp.length === 10 ? timestamp : `${timestamp}Z`);
  if (Number.isNaN(millis)) return null;

  // Date.parse rolls impossible calendar dates (Feb 30) into the next month.
  const [, year, month, day] = prefix;
  const calendar = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (calendar.getUTCMonth() + 1 !== Number(month) || calendar.getUTCDate() !== Number(day)) {
    return null;
  }
  return millis;
}

/** Formats as "October 19, 2026 at 01:13 PM" (UTC), falling back to the raw value. */
export function formatDisplayTime(timestamp: string): string {
  const millis = parseTimestamp(timestamp);
  if (millis === null) {
    return timestamp || 'Unknown Time';
  }

  const date = new Date(millis);
  const hours = date.getUTCHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const pad = (n: number) => String(n).padStart(2, '0');

  return (
    `${MONTHS[date.getUTCMonth()]} ${pad(date.getUTCDate())}, ${date.getUTCFullYear()} ` +
    `at ${pad(hour12)}:${pad(date.getUTCMinutes())} ${hours < 12 ? 'AM' : 'PM'}`
  );
}

/**
 * Newest first. Entries whose timestamp does not parse come after every
 * valid one, ordered among themselves by the raw string, descending.
 */
export function sortForDisplay(entries: StoredTranscriptEntry[]): StoredTranscriptEntry[] {
  const keyed = entries.map((entry) => ({ entry, millis: parseTimestamp(entry.record.timestamp) }));

  keyed.sort((a, b) => {
    if (a.millis !== null && b.millis !== null) return b.millis - a.millis;
    if (a.millis !== null) return -1;
    if (b.millis !== null) return 1;
    const rawA = a.entry.record.timestamp;
    const rawB = b.entry.record.timestamp;
    return rawA < rawB ? 1 : rawA > rawB ? -1 : 0;
  });

  return keyed.map(({ entry }) => entry);
}

export class HistoryService {
  constructor(private transcriptStore: TranscriptStore) {}

  async listHistory(): Promise<HistoryEntry[]> {
    const entries = await this.transcriptStore.list();

    return sortForDisplay(entries).map(({ id, record }) => ({
      id,
      participant: record.participant || 'Anonymous',
      jobTitle: record.jobTitle || 'Unknown Job',
      model: record.model || 'N/A',
      timestamp: record.timestamp,
      displayTime: formatDisplayTime(record.timestamp),
      evaluation: record.evaluation || 'No evaluation found.',
      turns: record.turns,
    }));
  }
}
