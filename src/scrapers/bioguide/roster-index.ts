import { readFile } from 'node:fs/promises';
import { getCurrentCongress } from '../../congress/calendar';
import { BIOGUIDE_CONFIG } from './constants';

const ID_LENGTH = BIOGUIDE_CONFIG.BIOGUIDE_ID_LENGTH;

/**
 * Read-only roster snapshot. Line 0 holds the current Congress, line 1 the
 * one before it and so on; each line is a run of 7-character Bioguide IDs
 * with no separator.
 */
export class RosterIndex {
  private constructor(
    private readonly lines: readonly string[],
    readonly currentCongress: number
  ) {}

  static fromText(text: string, currentCongress: number = getCurrentCongress()): RosterIndex {
    return new RosterIndex(text.split(/\r?\n/), currentCongress);
  }

  static async fromFile(
    path: string,
    currentCongress: number = getCurrentCongress()
  ): Promise<RosterIndex> {
    return RosterIndex.fromText(await readFile(path, 'utf8'), currentCongress);
  }

  private line(congress: number): string | null {
    const offset = this.currentCongress - congress;
    if (!Number.isInteger(offset) || offset < 0) return null;

    const line = this.lines[offset]?.trim();
    return line ? line : null;
  }

  has(congress: number): boolean {
    return this.line(congress) !== null;
  }

  /**
   * IDs recorded for `congress`, or null when the index has no line for it.
   */
  lookup(congress: number): string[] | null {
    const line = this.line(congress);
    if (line === null) return null;

    const ids: string[] = [];
    for (let i = 0; i + ID_LENGTH <= line.length; i += ID_LENGTH) {
      ids.push(line.slice(i, i + ID_LENGTH).toUpperCase());
    }
    return ids;
  }
}
