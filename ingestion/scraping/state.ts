/**
 * Persisted record of which documents a source has already yielded.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { StateCorruptError } from '../shared/errors';

const stateFileSchema = z.object({
  sourceName: z.string(),
  seenIds: z.array(z.string()),
  rejected: z.record(z.string()).default({}),
  lastUpdated: z.string().datetime().nullable(),
});

export type StateFile = z.infer<typeof stateFileSchema>;

export interface LoadStateOptions {
  stateDir: string;
  /** Start from an empty state, ignoring (and later overwriting) whatever is on disk */
  reset?: boolean;
}

export function getStatePath(stateDir: string, sourceName: string): string {
  return path.join(stateDir, `${sourceName}_state.json`);
}

/**
 * Set of acquired document ids for one source.
 *
 * markSeen() and markRejected() only touch memory; save() writes the whole
 * state to a temporary file and renames it over the previous one.
 */
export class ScrapeState {
  readonly sourceName: string;
  readonly statePath: string;
  private seenIds: Set<string>;
  private rejected: Map<string, string>;
  private _lastUpdated: Date | null;

  constructor(sourceName: string, statePath: string, file?: StateFile) {
    this.sourceName = sourceName;
    this.statePath = statePath;
    this.seenIds = new Set(file?.seenIds ?? []);
    this.rejected = new Map(Object.entries(file?.rejected ?? {}));
    this._lastUpdated = file?.lastUpdated ? new Date(file.lastUpdated) : null;
  }

  /**
   * Load the state for a source.
   *
   * A missing file is an empty state.
   *
   * @throws {StateCorruptError} If the file exists but cannot be parsed and reset is not set
   */
  static async load(sourceName: string, options: LoadStateOptions): Promise<ScrapeState> {
    const statePath = getStatePath(options.stateDir, sourceName);

    if (options.reset) {
      return new ScrapeState(sourceName, statePath);
    }

    let raw: string;
    try {
      raw = await fs.readFile(statePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return new ScrapeState(sourceName, statePath);
      }
      throw new StateCorruptError(statePath, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StateCorruptError(statePath, error);
    }

    const parsed = stateFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new StateCorruptError(statePath, parsed.error.issues[0]?.message ?? 'invalid structure');
    }
    if (parsed.data.sourceName !== sourceName) {
      throw new StateCorruptError(
        statePath,
        `belongs to source '${parsed.data.sourceName}', expected '${sourceName}'`
      );
    }

    return new ScrapeState(sourceName, statePath, parsed.data);
  }

  get size(): number {
    return this.seenIds.size;
  }

  get lastUpdated(): Date | null {
    return this._lastUpdated;
  }

  contains(id: string): boolean {
    return this.seenIds.has(id);
  }

  markSeen(id: string): void {
    this.seenIds.add(id);
    this.rejected.delete(id);
    this._lastUpdated = new Date();
  }

  /**
   * Record a permanent failure so the document is not requested again
   * until the state is reset or the run is forced.
   */
  markRejected(id: string, reason: string): void {
    if (this.seenIds.has(id)) return;
    this.rejected.set(id, reason);
    this._lastUpdated = new Date();
  }

  isRejected(id: string): boolean {
    return this.rejected.has(id);
  }

  rejectionReason(id: string): string | undefined {
    return this.rejected.get(id);
  }

  seen(): string[] {
    return [...this.seenIds];
  }

  reset(): void {
    this.seenIds.clear();
    this.rejected.clear();
    this._lastUpdated = new Date();
  }

  toJSON(): StateFile {
    return {
      sourceName: this.sourceName,
      seenIds: [...this.seenIds],
      rejected: Object.fromEntries(this.rejected),
      lastUpdated: this._lastUpdated ? this._lastUpdated.toISOString() : null,
    };
  }

  /**
   * Write the state atomically (temp file + rename in the same directory).
   */
  async save(): Promise<void> {
    const dir = path.dirname(this.statePath);
    const tmpPath = path.join(dir, `.${path.basename(this.statePath)}.${process.pid}.tmp`);

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(this.toJSON(), null, 2), 'utf8');
      await fs.rename(tmpPath, this.statePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw new Error(`Failed to save scrape state to ${this.statePath}: ${error}`);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
