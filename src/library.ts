import { promises as fs } from 'fs';
import path from 'path';
import type { CatalogStore } from './catalog.js';
import { SourceNotFound, errorMessage } from './errors.js';
import { parseProfile, profileFromSource, serializeProfile, sourceInputFromProfile } from './profile.js';
import { fileExists, sourceFolderPath } from './utils/file-utils.js';
import { logger } from './utils/logger.js';
import { commitGate } from './write-gate.js';
import type { WriteGate } from './write-gate.js';
import type { Source, SourceInput } from './types.js';

/** User-facing operations on the sources of a catalog and their download folders. */
export class Library {
  constructor(
    private store: CatalogStore,
    private outputDir: string,
    private gate: WriteGate = commitGate
  ) {}

  require(ref: string): Source {
    const source = this.store.findSource(ref);
    if (!source) {
      throw new SourceNotFound(ref);
    }
    return source;
  }

  list(): Source[] {
    return this.store.listSources();
  }

  folderFor(source: Source): string {
    return sourceFolderPath(this.outputDir, source.name);
  }

  async add(input: SourceInput): Promise<Source> {
    sourceFolderPath(this.outputDir, input.name);
    const source = this.store.addSource(input);
    await this.save();
    return source;
  }

  /**
   * Applies `changes` to a source. A rename moves its download folder along,
   * unless a folder with the new name already exists, and repoints the
   * recorded download paths.
   */
  async edit(ref: string, changes: Partial<SourceInput>): Promise<Source> {
    const source = this.require(ref);
    if (changes.name !== undefined) {
      sourceFolderPath(this.outputDir, changes.name);
    }
    const oldFolder = this.folderFor(source);

    Object.assign(source, Object.fromEntries(Object.entries(changes).filter(([, value]) => value !== undefined)));
    const newFolder = this.folderFor(source);

    if (oldFolder !== newFolder && (await this.moveFolder(oldFolder, newFolder))) {
      const prefix = oldFolder + path.sep;
      for (const page of this.store.pages(source.id)) {
        for (const image of page.images) {
          if (image.downloadPath.startsWith(prefix)) {
            image.downloadPath = path.join(newFolder, image.downloadPath.slice(prefix.length));
          }
        }
      }
    }

    await this.save();
    return source;
  }

  private async moveFolder(from: string, to: string): Promise<boolean> {
    if (!(await fileExists(from)) || (await fileExists(to))) return false;
    try {
      await fs.rename(from, to);
      logger.info(`Moved ${from} to ${to}`);
      return true;
    } catch (error) {
      logger.warn(`Failed to rename folder from ${from} to ${to}: ${errorMessage(error)}`);
      return false;
    }
  }

  /** Removes the source's download folder and everything in it. */
  async deleteDownloads(ref: string): Promise<boolean> {
    const folder = this.folderFor(this.require(ref));
    if (!(await fileExists(folder))) return false;
    await fs.rm(folder, { recursive: true, force: true });
    return true;
  }

  exportProfile(ref: string): string {
    return serializeProfile(profileFromSource(this.require(ref)));
  }

  async importProfile(text: string): Promise<Source> {
    return this.add(sourceInputFromProfile(parseProfile(text)));
  }

  private async save(): Promise<void> {
    await this.gate.runExclusive(() => this.store.commit());
  }
}
