/**
 * Sound Catalog
 * Reaction sounds indexed by category, scanned once at startup from
 * <root>/<category>/<file>. Read-only afterwards.
 *
 * A category belongs to a mode's pool by name prefix: predator_* -> predators,
 * woodpecker_* -> woodpeckers. Mixed draws from every category. Categories
 * without assets are listed but never selected.
 */

import { readdir, stat } from 'fs/promises';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { defaultRng, pickIndex, type Rng } from '../utils/random.js';
import { EmptyCategory, NotFound, StartupError, errorMessage } from '../errors.js';
import { MODE_GROUP_PREFIX, type ReactionMode } from '../types/index.js';

export const AUDIO_EXTENSIONS = ['.mp3', '.wav', '.ogg'];

export const MIME_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.ogg': 'audio/ogg',
};

export class SoundCatalog {
  private readonly entries: ReadonlyMap<string, readonly string[]>;

  constructor(readonly root: string, listing: Record<string, string[]>) {
    const entries = new Map<string, readonly string[]>();
    for (const category of Object.keys(listing).sort()) {
      entries.set(category, Object.freeze([...new Set(listing[category])].sort()));
    }
    this.entries = entries;
  }

  /**
   * Scan the asset root. Sub-directories become categories; files with an
   * audio extension become assets.
   * @throws StartupError when the root is missing or unreadable
   */
  static async scan(root: string): Promise<SoundCatalog> {
    let names: string[];
    try {
      const info = await stat(root);
      if (!info.isDirectory()) {
        throw new Error('not a directory');
      }
      names = await readdir(root);
    } catch (err) {
      throw new StartupError(`Sound directory ${root} is not readable: ${errorMessage(err)}`, { cause: err });
    }

    const listing: Record<string, string[]> = {};
    for (const name of names) {
      const categoryPath = path.join(root, name);
      const info = await stat(categoryPath);
      if (!info.isDirectory()) continue;

      const files = await readdir(categoryPath);
      listing[name] = files.filter(f => AUDIO_EXTENSIONS.includes(path.extname(f).toLowerCase()));
    }

    const catalog = new SoundCatalog(root, listing);
    logger.info('Sounds', `Catalog scanned: ${catalog.categories().length} categories, ${catalog.totalAssets()} assets`, {
      root,
      empty: catalog.categories().filter(c => catalog.assets(c).length === 0),
    });
    return catalog;
  }

  categories(): string[] {
    return [...this.entries.keys()];
  }

  has(category: string): boolean {
    return this.entries.has(category);
  }

  assets(category: string): readonly string[] {
    const files = this.entries.get(category);
    if (!files) {
      throw new NotFound(`Sound category "${category}"`);
    }
    return files;
  }

  listing(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [category, files] of this.entries) {
      result[category] = [...files];
    }
    return result;
  }

  totalAssets(): number {
    let total = 0;
    for (const files of this.entries.values()) total += files.length;
    return total;
  }

  /**
   * Uniform pick within one category
   * @throws NotFound for an unknown category, EmptyCategory for one without assets
   */
  pick(category: string, rng: Rng = defaultRng): string {
    const files = this.assets(category);
    if (files.length === 0) {
      throw new EmptyCategory(category);
    }
    return files[pickIndex(files.length, rng)];
  }

  /**
   * Non-empty categories a mode may draw from
   */
  eligibleCategories(mode: ReactionMode): string[] {
    if (mode === 'silent') return [];

    const nonEmpty = this.categories().filter(c => this.assets(c).length > 0);
    if (mode === 'mixed') return nonEmpty;

    const prefix = MODE_GROUP_PREFIX[mode];
    return nonEmpty.filter(c => c.split('_')[0] === prefix);
  }

  /**
   * Uniform category choice for a mode; null for silent or when nothing is eligible
   */
  resolve(mode: ReactionMode, rng: Rng = defaultRng): string | null {
    const eligible = this.eligibleCategories(mode);
    if (eligible.length === 0) return null;
    return eligible[pickIndex(eligible.length, rng)];
  }

  /**
   * Absolute path of a listed asset. Only names present in the scan resolve,
   * so request paths cannot leave the root.
   * @throws NotFound
   */
  assetPath(category: string, filename: string): string {
    const files = this.entries.get(category);
    if (!files || !files.includes(filename)) {
      throw new NotFound(`Sound ${category}/${filename}`);
    }
    return path.join(this.root, category, filename);
  }
}
